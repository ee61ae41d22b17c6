/**
 * Manifest Facade Tests
 *
 * Effective name and deploy config queries over parsed manifests.
 */

import { Manifest } from '../src/core/manifest/manifest';
import { resolveDeployConfig, topLevelRouteInputs } from '../src/core/manifest/route-resolver';
import { prefixedEnvOverlay } from '../src/config/env-overlay';
import { InvalidNameError, LookupError, RouteError } from '../src/core/errors';
import { EnvironmentOverlay, ManifestDocument } from '../src/types';
import { expectThrown } from './helpers';

describe('Manifest', () => {
  const zonedTree = {
    name: 'worker',
    type: 'webpack',
    account_id: 'test-account',
    zone_id: 'test-zone',
    route: 'example.com/*',
    env: {
      production: { routes: ['example.com/*', 'www.example.com/*'] },
      staging: { name: 'worker-preview', workers_dev: true },
      qa: { account_id: 'qa-account' },
      dev: { route: 'dev.example.com/*', workers_dev: true },
    },
  };

  const zonelessTree = {
    name: 'worker',
    type: 'javascript',
    account_id: 'test-account',
    workers_dev: true,
    env: {
      staging: {},
      prod: { name: 'custom' },
    },
  };

  describe('effectiveName', () => {
    const manifest = Manifest.fromTree(zonelessTree);

    it('should return the top-level name without an environment', () => {
      expect(manifest.effectiveName()).toBe('worker');
    });

    it('should append the environment name when the overlay has no name', () => {
      expect(manifest.effectiveName('staging')).toBe('worker-staging');
    });

    it('should use the explicit overlay name', () => {
      expect(manifest.effectiveName('prod')).toBe('custom');
    });

    it('should fall back to the top-level name for an unknown environment', () => {
      expect(manifest.effectiveName('preview')).toBe('worker');
    });

    it('should fall back to the top-level name when no environments exist', () => {
      const bare = Manifest.fromTree({ name: 'worker', type: 'webpack' });
      expect(bare.effectiveName('prod')).toBe('worker');
    });
  });

  describe('effectiveTarget', () => {
    it('should not inherit top-level kv-namespaces', () => {
      const manifest = Manifest.fromTree({
        ...zonelessTree,
        'kv-namespaces': [{ id: 'top-namespace', binding: 'CACHE' }],
      });
      expect(manifest.effectiveTarget().kvNamespaces).toEqual([{ id: 'top-namespace', binding: 'CACHE' }]);
      expect(manifest.effectiveTarget('staging').kvNamespaces).toBeUndefined();
    });
  });

  describe('deployConfig', () => {
    it('should resolve the top level directly when there are no environments', () => {
      const tree = { name: 'worker', type: 'webpack', account_id: 'test-account', zone_id: 'test-zone', route: 'example.com/*' };
      const manifest = Manifest.fromTree(tree);
      expect(manifest.deployConfig()).toEqual(resolveDeployConfig('worker', topLevelRouteInputs(manifest.document)));
      expect(manifest.deployConfig()).toEqual({
        kind: 'zoned',
        accountId: 'test-account',
        zoneId: 'test-zone',
        scriptName: 'worker',
        routes: ['example.com/*'],
      });
    });

    it('should use the environment routes with the top-level zone', () => {
      const manifest = Manifest.fromTree(zonedTree);
      expect(manifest.deployConfig('production')).toEqual({
        kind: 'zoned',
        accountId: 'test-account',
        zoneId: 'test-zone',
        scriptName: 'worker-production',
        routes: ['example.com/*', 'www.example.com/*'],
      });
    });

    it('should ignore top-level routing when the environment declares its own', () => {
      const manifest = Manifest.fromTree(zonedTree);
      expect(manifest.deployConfig('staging')).toEqual({
        kind: 'zoneless',
        accountId: 'test-account',
        scriptName: 'worker-preview',
        workersDev: true,
      });
    });

    it('should require environment routes when the top level is zoned', () => {
      const manifest = Manifest.fromTree(zonedTree);
      const error = expectThrown(() => manifest.deployConfig('qa'), RouteError);
      expect(error.kind).toBe('EnvironmentRouteRequired');
      expect(error.message).toBe('You must specify route(s) per environment for zoned deploys');
    });

    it('should reuse a zoneless top level for an environment without routing', () => {
      const manifest = Manifest.fromTree(zonelessTree);
      expect(manifest.deployConfig('staging')).toEqual({
        kind: 'zoneless',
        accountId: 'test-account',
        scriptName: 'worker-staging',
        workersDev: true,
      });
    });

    it('should pass a top-level NoTarget through an environment without routing', () => {
      const manifest = Manifest.fromTree({
        name: 'worker',
        type: 'webpack',
        account_id: 'test-account',
        env: { staging: {} },
      });
      expect(expectThrown(() => manifest.deployConfig('staging'), RouteError).kind).toBe('NoTarget');
    });

    it('should pass a top-level MissingZoneId through an environment without routing', () => {
      const manifest = Manifest.fromTree({
        name: 'worker',
        type: 'webpack',
        account_id: 'test-account',
        route: 'example.com/*',
        env: { qa: { account_id: 'qa-account' } },
      });
      expect(expectThrown(() => manifest.deployConfig('qa'), RouteError).kind).toBe('MissingZoneId');
    });

    it('should report ambiguous environment routing', () => {
      const manifest = Manifest.fromTree(zonedTree);
      expect(expectThrown(() => manifest.deployConfig('dev'), RouteError).kind).toBe('AmbiguousConfig');
    });

    it('should report ambiguous top-level routing', () => {
      const manifest = Manifest.fromTree({
        name: 'worker',
        type: 'webpack',
        account_id: 'test-account',
        zone_id: 'test-zone',
        route: 'example.com/*',
        routes: ['a.com/*'],
      });
      expect(expectThrown(() => manifest.deployConfig(), RouteError).kind).toBe('AmbiguousConfig');
    });

    it('should fail for an unknown environment', () => {
      const manifest = Manifest.fromTree(zonelessTree);
      expect(expectThrown(() => manifest.deployConfig('preview'), LookupError).kind).toBe('UnknownEnvironment');
    });

    it('should reject an invalid worker name', () => {
      const manifest = Manifest.fromTree({ ...zonelessTree, name: 'My Worker', env: undefined });
      expect(expectThrown(() => manifest.deployConfig(), InvalidNameError).workerName).toBe('My Worker');
    });

    it('should reject a missing worker name', () => {
      const manifest = Manifest.fromTree({ type: 'webpack', account_id: 'test-account', workers_dev: true });
      const error = expectThrown(() => manifest.deployConfig(), InvalidNameError);
      expect(error.workerName).toBe('');
      expect(error.message).toBe('A worker name is required; set `name` in your manifest');
    });

    it('should use a supplied name predicate', () => {
      const manifest = Manifest.fromTree({ ...zonelessTree, name: 'My Worker', env: undefined }, { isValidName: () => true });
      expect(manifest.deployConfig()).toEqual({
        kind: 'zoneless',
        accountId: 'test-account',
        scriptName: 'My Worker',
        workersDev: true,
      });
    });

    it('should allow a dev-only target when requested', () => {
      const manifest = Manifest.fromTree({ name: 'worker', type: 'webpack', account_id: 'test-account' });
      expect(expectThrown(() => manifest.deployConfig(), RouteError).kind).toBe('NoTarget');
      expect(manifest.deployConfig(undefined, { allowDevOnly: true })).toEqual({
        kind: 'zoneless',
        accountId: 'test-account',
        scriptName: 'worker',
        workersDev: false,
      });
    });
  });

  describe('fromDocument', () => {
    const buildDocument = (): { document: ManifestDocument; prod: EnvironmentOverlay } => {
      const prod: EnvironmentOverlay = {
        name: 'worker-prod',
        kvNamespaces: [{ id: 'prod-namespace', binding: 'CACHE' }],
      };
      const document: ManifestDocument = {
        name: 'worker',
        targetKind: 'webpack',
        accountId: 'test-account',
        workersDev: true,
        site: { bucket: './public', include: ['*.html'] },
        environments: { prod },
      };
      return { document, prod };
    };

    it('should not see later changes to the caller document', () => {
      const { document, prod } = buildDocument();
      const manifest = Manifest.fromDocument(document);
      const before = manifest.serialize();

      prod.name = 'worker';
      document.name = 'renamed';

      expect(manifest.effectiveName('prod')).toBe('worker-prod');
      expect(manifest.effectiveName()).toBe('worker');
      expect(manifest.serialize()).toEqual(before);
    });

    it('should not let effective targets change the document', () => {
      const { document } = buildDocument();
      const manifest = Manifest.fromDocument(document);
      const before = manifest.serialize();

      manifest.effectiveTarget('prod').kvNamespaces?.push({ id: 'extra-namespace', binding: 'EXTRA' });
      manifest.effectiveTarget().site?.include?.push('*.js');

      expect(manifest.effectiveTarget('prod').kvNamespaces).toEqual([{ id: 'prod-namespace', binding: 'CACHE' }]);
      expect(manifest.effectiveTarget().site).toEqual({ bucket: './public', include: ['*.html'] });
      expect(manifest.serialize()).toEqual(before);
    });
  });

  describe('fromTree', () => {
    it('should apply environment overrides before parsing', () => {
      const manifest = Manifest.fromTree(
        { name: 'worker', type: 'webpack', workers_dev: true },
        { envOverlay: prefixedEnvOverlay({ CF_ACCOUNT_ID: 'env-account' }) }
      );
      expect(manifest.document.accountId).toBe('env-account');
      expect(manifest.deployConfig()).toEqual({
        kind: 'zoneless',
        accountId: 'env-account',
        scriptName: 'worker',
        workersDev: true,
      });
    });
  });

  describe('serialize', () => {
    it('should return the tree the manifest was built from', () => {
      const manifest = Manifest.fromTree(zonedTree);
      manifest.deployConfig('production');
      manifest.effectiveTarget('qa');
      expect(manifest.serialize()).toEqual(zonedTree);
    });
  });
});
