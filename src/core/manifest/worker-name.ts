import { NamePredicate } from '../../types';

const WORKER_NAME_PATTERN = /^[a-z0-9_][a-z0-9-_]*$/;

/**
 * Default worker name check: lowercase alphanumerics, dashes and underscores,
 * not starting with a dash.
 */
export const isValidWorkerName: NamePredicate = (name) => WORKER_NAME_PATTERN.test(name);
