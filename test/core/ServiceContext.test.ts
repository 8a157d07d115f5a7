import { createServiceContext, requireService } from '../../src/core/ServiceContext';
import { SvcdeckSettings } from '../../src/types/Config';
import { createTempDir, cleanupTempDir, writeService } from '../setup';

describe('ServiceContext', () => {
  let root: string;
  let settings: SvcdeckSettings;

  beforeEach(async () => {
    root = await createTempDir();
    settings = {
      servicesDir: root,
      composeCommand: 'docker compose',
      logLevel: 'info',
      healthTimeoutMs: 2000,
      statusTimeoutMs: 10000,
      containerQueryTimeoutMs: 5000,
      commandTimeoutMs: 120000,
    };
  });

  afterEach(async () => {
    await cleanupTempDir(root);
  });

  describe('requireService', () => {
    it('should return a known service', async () => {
      await writeService(root, 'langfuse', { name: 'Langfuse', description: 'Tracing' });
      const context = createServiceContext(settings);

      expect(requireService(context, 'langfuse').name).toBe('Langfuse');
    });

    it('should list the available ids for an unknown service', async () => {
      await writeService(root, 'b', { name: 'B', description: 'b' });
      await writeService(root, 'a', { name: 'A', description: 'a' });
      const context = createServiceContext(settings);

      expect(() => requireService(context, 'zzz')).toThrow(
        "Service 'zzz' not found. Available services: a, b"
      );
    });

    it('should say none when the catalog is empty', () => {
      const context = createServiceContext(settings);

      expect(() => requireService(context, 'zzz')).toThrow(
        "Service 'zzz' not found. Available services: none"
      );
    });
  });

  it('should share one registry with the health monitor', async () => {
    await writeService(root, 'svc', { name: 'Svc', description: 's', lifecycle: { status: 'true' } });
    const context = createServiceContext(settings);

    expect(await context.health.checkAll()).toEqual({ svc: 'running' });
  });
});
