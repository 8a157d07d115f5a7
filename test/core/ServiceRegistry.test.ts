import * as fs from 'fs-extra';
import * as path from 'path';
import { ServiceRegistry, parseDescriptor } from '../../src/core/ServiceRegistry';
import { DescriptorParseError } from '../../src/types/Errors';
import { primaryPort } from '../../src/types/Service';
import { createTempDir, cleanupTempDir, writeService } from '../setup';

describe('ServiceRegistry', () => {
  let root: string;
  let reported: DescriptorParseError[];
  let registry: ServiceRegistry;

  beforeEach(async () => {
    root = await createTempDir();
    reported = [];
    registry = new ServiceRegistry(root, error => reported.push(error));
  });

  afterEach(async () => {
    await cleanupTempDir(root);
  });

  describe('discover', () => {
    it('should return one entry per directory with a descriptor, in name order', async () => {
      await writeService(root, 'piper-tts', { name: 'Piper', description: 'Text to speech' });
      await writeService(root, 'langfuse', { name: 'Langfuse', description: 'Tracing' });
      await fs.ensureDir(path.join(root, 'scratch'));
      await fs.writeFile(path.join(root, 'README.md'), '# services');

      const services = registry.discover();

      expect(services.map(s => s.id)).toEqual(['langfuse', 'piper-tts']);
      expect(reported).toEqual([]);
    });

    it('should include symlinked service directories and skip dangling links', async () => {
      const elsewhere = await createTempDir();
      try {
        const target = await writeService(elsewhere, 'real', {
          name: 'Linked',
          description: 'Lives outside the services directory',
        });
        await fs.ensureSymlink(target, path.join(root, 'linked'));
        await fs.symlink(path.join(elsewhere, 'missing'), path.join(root, 'dangling'));

        const services = registry.discover();

        expect(services.map(s => s.id)).toEqual(['linked']);
        expect(services[0]?.path).toBe(path.join(root, 'linked'));
        expect(reported).toEqual([]);
      } finally {
        await cleanupTempDir(elsewhere);
      }
    });

    it('should return an empty list when the services directory does not exist', () => {
      const missing = new ServiceRegistry(path.join(root, 'nope'));
      expect(missing.discover()).toEqual([]);
    });

    it('should fill in defaults for optional fields', async () => {
      const servicePath = await writeService(root, 'minimal', {
        name: 'Minimal',
        description: 'Only the required fields',
      });

      const [service] = registry.discover();

      expect(service).toEqual({
        id: 'minimal',
        name: 'Minimal',
        description: 'Only the required fields',
        category: 'optional',
        path: servicePath,
        ports: [],
        envVars: [],
        systemDependencies: [],
        serviceDependencies: [],
        notes: {},
        lifecycle: {},
      });
    });

    it('should parse every descriptor field', async () => {
      await writeService(root, 'openmemory', {
        name: 'OpenMemory',
        description: 'Memory layer',
        category: 'core',
        vendor: { url: 'https://example.com/openmemory.git', ref: 'v1.2.0' },
        ports: [
          { name: 'ui', port: 3000 },
          { name: 'api', port: 8765, health_endpoint: '/health' },
        ],
        env_vars: [
          { name: 'API_KEY', required: true, secret: true, description: 'Provider key' },
          { name: 'PORT', default: 8765 },
        ],
        dependencies: { system: ['docker'], services: ['langfuse'] },
        lifecycle: { status: 'exit 0', logs: 'tail app.log' },
        notes: { setup: 'Run install first', retries: 3 },
      });

      const [service] = registry.discover();

      expect(service?.category).toBe('core');
      expect(service?.vendor).toEqual({ url: 'https://example.com/openmemory.git', ref: 'v1.2.0' });
      expect(service?.ports).toEqual([
        { name: 'ui', port: 3000 },
        { name: 'api', port: 8765, healthEndpoint: '/health' },
      ]);
      expect(service?.envVars).toEqual([
        {
          name: 'API_KEY',
          required: true,
          secret: true,
          description: 'Provider key',
        },
        { name: 'PORT', required: false, secret: false, default: '8765' },
      ]);
      expect(service?.systemDependencies).toEqual(['docker']);
      expect(service?.serviceDependencies).toEqual(['langfuse']);
      expect(service?.lifecycle).toEqual({ status: 'exit 0', logs: 'tail app.log' });
      expect(service?.notes).toEqual({ setup: 'Run install first', retries: '3' });
    });

    it('should exclude a descriptor without a name and keep its siblings', async () => {
      await writeService(root, 'alpha', { name: 'Alpha', description: 'First' });
      await writeService(root, 'broken', { description: 'No name here' });
      await writeService(root, 'gamma', { name: 'Gamma', description: 'Third' });

      const services = registry.discover();

      expect(services.map(s => s.id)).toEqual(['alpha', 'gamma']);
      expect(reported).toHaveLength(1);
      expect(reported[0]).toBeInstanceOf(DescriptorParseError);
      expect(reported[0]?.reason).toBe("'name' is required");
      expect(reported[0]?.file).toBe(path.join(root, 'broken', 'service.yaml'));
    });

    it('should exclude a descriptor without a description', async () => {
      await writeService(root, 'broken', { name: 'Broken' });

      expect(registry.discover()).toEqual([]);
      expect(reported[0]?.reason).toBe("'description' is required");
    });

    it('should exclude descriptors that are not valid YAML mappings', async () => {
      await writeService(root, 'bad-yaml', 'name: [unclosed\n');
      await writeService(root, 'scalar', 'just a string\n');
      await writeService(root, 'ok', { name: 'Ok', description: 'Fine' });

      const services = registry.discover();

      expect(services.map(s => s.id)).toEqual(['ok']);
      expect(reported).toHaveLength(2);
      expect(reported[1]?.reason).toBe('descriptor must be a mapping');
    });

    it('should require both url and ref when vendor is present', async () => {
      await writeService(root, 'vendored', {
        name: 'Vendored',
        description: 'Missing ref',
        vendor: { url: 'https://example.com/repo.git' },
      });

      expect(registry.discover()).toEqual([]);
      expect(reported[0]?.reason).toBe("'vendor.ref' is required");
    });

    it('should reject unknown categories and out-of-range ports', async () => {
      await writeService(root, 'odd-category', {
        name: 'Odd',
        description: 'Bad category',
        category: 'legacy',
      });
      await writeService(root, 'odd-port', {
        name: 'Odd',
        description: 'Bad port',
        ports: [{ name: 'web', port: 70000 }],
      });

      expect(registry.discover()).toEqual([]);
      expect(reported.map(error => error.reason)).toEqual([
        "'category' must be one of core, optional, experimental",
        "'ports[0].port' must be an integer between 1 and 65535",
      ]);
    });

    it('should return frozen configs', async () => {
      await writeService(root, 'frozen', {
        name: 'Frozen',
        description: 'Immutable',
        ports: [{ name: 'web', port: 80 }],
      });

      const [service] = registry.discover();

      expect(Object.isFrozen(service)).toBe(true);
      expect(Object.isFrozen(service?.ports)).toBe(true);
      expect(Object.isFrozen(service?.lifecycle)).toBe(true);
    });

    it('should replace cached entries on rediscovery', async () => {
      await writeService(root, 'svc', { name: 'Before', description: 'v1' });
      registry.discover();
      await writeService(root, 'svc', { name: 'After', description: 'v2' });

      registry.discover();

      expect(registry.get('svc')?.name).toBe('After');
    });
  });

  describe('get', () => {
    it('should return the cached entry without reading the disk again', async () => {
      await writeService(root, 'svc', { name: 'Cached', description: 'From discovery' });
      registry.discover();
      await writeService(root, 'svc', { name: 'Changed', description: 'On disk only' });

      expect(registry.get('svc')?.name).toBe('Cached');
    });

    it('should load a single entry that was never discovered', async () => {
      await writeService(root, 'other', { name: 'Other', description: 'Not loaded' });
      await writeService(root, 'wanted', { name: 'Wanted', description: 'Loaded on demand' });

      expect(registry.get('wanted')?.name).toBe('Wanted');
      // no full rescan happened
      expect(registry.list().map(s => s.id)).toEqual(['wanted']);
    });

    it('should return undefined for unknown ids and path-like ids', async () => {
      await writeService(root, 'svc', { name: 'Svc', description: 'Exists' });

      expect(registry.get('missing')).toBeUndefined();
      expect(registry.get('../svc')).toBeUndefined();
      expect(registry.get('..')).toBeUndefined();
    });

    it('should throw DescriptorParseError for an invalid descriptor', async () => {
      await writeService(root, 'broken', { name: 'Broken' });

      expect(() => registry.get('broken')).toThrow(DescriptorParseError);
    });
  });

  describe('reload', () => {
    it('should pick up changes to one descriptor', async () => {
      await writeService(root, 'svc', { name: 'Before', description: 'v1' });
      registry.discover();
      await writeService(root, 'svc', { name: 'After', description: 'v2' });

      expect(registry.reload('svc')?.name).toBe('After');
      expect(registry.get('svc')?.name).toBe('After');
    });

    it('should drop an entry whose descriptor was removed', async () => {
      const servicePath = await writeService(root, 'svc', { name: 'Gone', description: 'Soon' });
      registry.discover();
      await fs.remove(path.join(servicePath, 'service.yaml'));

      expect(registry.reload('svc')).toBeUndefined();
      expect(registry.get('svc')).toBeUndefined();
    });
  });

  describe('list', () => {
    it('should discover when nothing is cached', async () => {
      await writeService(root, 'b', { name: 'B', description: 'b' });
      await writeService(root, 'a', { name: 'A', description: 'a' });

      expect(registry.ids()).toEqual(['a', 'b']);
    });
  });
});

describe('primaryPort', () => {
  const config = (ports: unknown[]) =>
    parseDescriptor({ name: 'Svc', description: 'Ports', ports }, 'svc', '/srv/svc');

  it('should prefer the first port with a health endpoint', () => {
    const port = primaryPort(
      config([
        { name: 'ui', port: 3000 },
        { name: 'api', port: 8000, health_endpoint: '/healthz' },
        { name: 'admin', port: 9000, health_endpoint: '/ping' },
      ])
    );
    expect(port?.name).toBe('api');
  });

  it('should fall back to the first port', () => {
    const port = primaryPort(
      config([
        { name: 'ui', port: 3000 },
        { name: 'api', port: 8000 },
      ])
    );
    expect(port?.name).toBe('ui');
  });

  it('should be undefined without ports', () => {
    expect(primaryPort(config([]))).toBeUndefined();
  });
});
