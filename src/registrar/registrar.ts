/**
 * Project registrar
 *
 * Create-if-absent against the analysis server, plus best-effort branch
 * and metadata updates that never throw.
 */

import { SonarApiError, type AnalysisServerApi } from './sonar-client.js';
import type { RegistrationOutcome } from '../types/job.js';
import type { JobLogger } from '../jobs/job-logger.js';

/** Suffix appended to display names of configuration-only projects */
export const CONFIG_ONLY_SUFFIX = ' (config only)';

/**
 * Best-effort metadata update, as needed by the scan executors
 */
export interface MetadataUpdater {
  updateMetadata(key: string, name: string, description: string, logger: JobLogger): Promise<boolean>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The server rejects a duplicate key with 400; another process may have
 * created the project between the existence check and the create call
 */
function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof SonarApiError && error.status === 400 && /already exists/i.test(error.body);
}

export class ProjectRegistrar implements MetadataUpdater {
  constructor(private readonly api: AnalysisServerApi) {}

  /**
   * Ensure a project exists for the key
   *
   * @returns Which branch was taken
   * @throws When the existence check or the creation fails
   */
  async ensureProject(key: string, name: string, logger: JobLogger): Promise<RegistrationOutcome> {
    if (await this.api.projectExists(key)) {
      logger.success('register', `Project ${key} already exists.`);
      return 'exists';
    }

    try {
      await this.api.createProject(key, name);
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        logger.success('register', `Project ${key} was created concurrently; treating as existing.`);
        return 'exists';
      }
      throw error;
    }

    logger.success('register', `Project ${key} created successfully.`);
    return 'created';
  }

  /**
   * Point the project's main branch at the synchronised branch name
   *
   * @returns False when the update failed (logged, not thrown)
   */
  async syncDefaultBranch(key: string, branch: string, logger: JobLogger): Promise<boolean> {
    try {
      await this.api.renameMainBranch(key, branch);
      logger.debug('register', `Main branch of ${key} set to ${branch}`);
      return true;
    } catch (error) {
      logger.warn('register', `Could not set main branch of ${key} to ${branch}: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Update display name and description
   *
   * @returns False when either update failed (logged, not thrown)
   */
  async updateMetadata(key: string, name: string, description: string, logger: JobLogger): Promise<boolean> {
    try {
      await this.api.setProjectSetting(key, 'sonar.projectName', name);
      await this.api.setProjectSetting(key, 'sonar.projectDescription', description);
      logger.info('register', `Project ${key} renamed to "${name}"`);
      return true;
    } catch (error) {
      logger.warn('register', `Could not update metadata of ${key}: ${errorMessage(error)}`);
      return false;
    }
  }
}
