/**
 * Project registrar tests
 */

import { describe, it, expect } from 'vitest';
import { ProjectRegistrar } from '../../src/registrar/registrar.js';
import { SonarApiError } from '../../src/registrar/sonar-client.js';
import { FakeAnalysisServer, memoryLogger } from '../helpers/fixtures.js';

describe('ProjectRegistrar', () => {
  it('should create a missing project once and report it as existing afterwards', async () => {
    const server = new FakeAnalysisServer();
    const registrar = new ProjectRegistrar(server);
    const { logger, entries } = memoryLogger();

    expect(await registrar.ensureProject('acme_widgets', 'acme-widgets', logger)).toBe('created');
    expect(await registrar.ensureProject('acme_widgets', 'acme-widgets', logger)).toBe('exists');

    expect(server.createCalls).toBe(1);
    expect(server.projects.get('acme_widgets')?.name).toBe('acme-widgets');
    expect(entries.map((e) => e.message)).toEqual([
      'Project acme_widgets created successfully.',
      'Project acme_widgets already exists.',
    ]);
  });

  it('should treat a duplicate-key rejection on create as existing', async () => {
    const server = new FakeAnalysisServer();
    server.createProject = async () => {
      throw new SonarApiError('POST', '/api/projects/create', 400, '{"errors":[{"msg":"key already exists"}]}');
    };
    const { logger } = memoryLogger();

    expect(await new ProjectRegistrar(server).ensureProject('acme_widgets', 'acme-widgets', logger)).toBe('exists');
  });

  it('should propagate other creation failures', async () => {
    const server = new FakeAnalysisServer();
    server.createProject = async () => {
      throw new SonarApiError('POST', '/api/projects/create', 403, 'Insufficient privileges');
    };
    const { logger } = memoryLogger();

    await expect(new ProjectRegistrar(server).ensureProject('acme_widgets', 'acme-widgets', logger)).rejects.toThrow(
      'POST /api/projects/create failed with HTTP 403: Insufficient privileges'
    );
  });

  it('should set the main branch and report success', async () => {
    const server = new FakeAnalysisServer();
    server.projects.set('acme_widgets', { name: 'acme-widgets', settings: {} });
    const { logger } = memoryLogger();

    expect(await new ProjectRegistrar(server).syncDefaultBranch('acme_widgets', 'develop', logger)).toBe(true);
    expect(server.projects.get('acme_widgets')?.branch).toBe('develop');
  });

  it('should never throw from best-effort updates', async () => {
    const server = new FakeAnalysisServer();
    server.failBranchRename = true;
    server.failSettings = true;
    const registrar = new ProjectRegistrar(server);
    const { logger, entries } = memoryLogger();

    expect(await registrar.syncDefaultBranch('acme_widgets', 'main', logger)).toBe(false);
    expect(await registrar.updateMetadata('acme_widgets', 'acme-widgets (config only)', 'plans', logger)).toBe(false);
    expect(entries.map((e) => e.level)).toEqual(['warn', 'warn']);
    expect(entries[0]?.message).toBe('Could not set main branch of acme_widgets to main: branch rename rejected');
  });

  it('should update name and description', async () => {
    const server = new FakeAnalysisServer();
    server.projects.set('acme_widgets', { name: 'acme-widgets', settings: {} });
    const { logger } = memoryLogger();

    expect(await new ProjectRegistrar(server).updateMetadata('acme_widgets', 'new name', 'about', logger)).toBe(true);
    expect(server.projects.get('acme_widgets')?.settings).toEqual({
      'sonar.projectName': 'new name',
      'sonar.projectDescription': 'about',
    });
  });
});
