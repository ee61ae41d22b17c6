/**
 * Error types raised while reading and resolving a worker manifest.
 *
 * Every error is terminal for the query that raised it. Callers decide how to
 * present them; the structured fields are the contract, the message is not.
 */

export type ManifestErrorCode =
  | 'FORMAT'
  | 'MISPLACED_FIELD'
  | 'NAME_CONFLICT'
  | 'INVALID_NAME'
  | 'LOOKUP'
  | 'ROUTE';

export abstract class ManifestError extends Error {
  public abstract readonly code: ManifestErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The document could not be read or does not match the manifest schema.
 */
export class FormatError extends ManifestError {
  public readonly code: ManifestErrorCode = 'FORMAT';
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.issues = issues;
  }
}

/**
 * A known field was found under a section that does not accept it.
 */
export class MisplacedFieldError extends FormatError {
  public readonly code: ManifestErrorCode = 'MISPLACED_FIELD';
  public readonly field: string;
  public readonly location: string;

  constructor(field: string, location: string) {
    super(
      `${field} should not live under the [${location}] section; please move it to the parent level, above [${location}].`,
      [`${location}.${field}: misplaced field`]
    );
    this.field = field;
    this.location = location;
  }
}

export class NameConflictError extends ManifestError {
  public readonly code: ManifestErrorCode = 'NAME_CONFLICT';
  public readonly duplicates: ReadonlySet<string>;

  constructor(duplicates: ReadonlySet<string>) {
    const names = [...duplicates];
    const wording = names.length === 1 ? 'this name is duplicated' : 'these names are duplicated';
    super(`Each name in your manifest must be unique, ${wording}: ${names.join(', ')}`);
    this.duplicates = duplicates;
  }
}

export class InvalidNameError extends ManifestError {
  public readonly code: ManifestErrorCode = 'INVALID_NAME';
  public readonly workerName: string;

  constructor(workerName: string) {
    super(
      workerName === ''
        ? 'A worker name is required; set `name` in your manifest'
        : `Invalid worker name "${workerName}": use lowercase letters, digits, dashes and underscores, not starting with a dash`
    );
    this.workerName = workerName;
  }
}

export type LookupErrorKind = 'UnknownEnvironment' | 'NoEnvironmentsDefined';

export class LookupError extends ManifestError {
  public readonly code: ManifestErrorCode = 'LOOKUP';
  public readonly kind: LookupErrorKind;
  public readonly environmentName: string;

  constructor(kind: LookupErrorKind, environmentName: string) {
    super(
      kind === 'UnknownEnvironment'
        ? `Could not find environment with name "${environmentName}"`
        : 'There are no environments specified in your manifest'
    );
    this.kind = kind;
    this.environmentName = environmentName;
  }
}

export type RouteErrorKind =
  | 'NoTarget'
  | 'AmbiguousConfig'
  | 'MissingAccountId'
  | 'MissingZoneId'
  | 'EnvironmentRouteRequired';

const ROUTE_ERROR_MESSAGES: Record<RouteErrorKind, string> = {
  NoTarget: 'No deploy target specified; set workers_dev = true or a route',
  AmbiguousConfig: 'Ambiguous deploy target; specify either workers_dev = true or route(s), and only one of route or routes',
  MissingAccountId: 'Field `account_id` is required to deploy',
  MissingZoneId: 'Field `zone_id` is required to deploy to routes',
  EnvironmentRouteRequired: 'You must specify route(s) per environment for zoned deploys',
};

export class RouteError extends ManifestError {
  public readonly code: ManifestErrorCode = 'ROUTE';
  public readonly kind: RouteErrorKind;

  constructor(kind: RouteErrorKind) {
    super(ROUTE_ERROR_MESSAGES[kind]);
    this.kind = kind;
  }
}

export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
