/**
 * Tree classifier
 *
 * Decides a repository's category from a single walk of its regular files.
 * Priority: performance-test > code > config > empty. A performance-test
 * plan ends the walk at once; a source file only rules out config/empty,
 * so the walk continues in case a test plan sits elsewhere in the tree.
 */

import { walkFiles, fileExtension } from './walk.js';
import {
  PERFORMANCE_TEST_EXTENSIONS,
  SOURCE_CODE_EXTENSIONS,
  YAML_EXTENSIONS,
  TERRAFORM_EXTENSIONS,
} from './extensions.js';
import type { Classification, ConfigTag } from '../types/classification.js';

/**
 * Classify the repository rooted at rootDir
 *
 * @param rootDir - Directory to classify (the job's scan path)
 * @returns Category plus config tags
 */
export async function classifyTree(rootDir: string): Promise<Classification> {
  let hasCode = false;
  let hasYaml = false;
  let hasTerraform = false;

  for await (const file of walkFiles(rootDir)) {
    const ext = fileExtension(file.name);

    if (PERFORMANCE_TEST_EXTENSIONS.has(ext)) {
      return { category: 'performance-test', tags: [] };
    }
    if (SOURCE_CODE_EXTENSIONS.has(ext)) {
      hasCode = true;
    } else if (YAML_EXTENSIONS.has(ext)) {
      hasYaml = true;
    } else if (TERRAFORM_EXTENSIONS.has(ext)) {
      hasTerraform = true;
    }
  }

  if (hasCode) {
    return { category: 'code', tags: [] };
  }

  const tags: ConfigTag[] = [];
  if (hasYaml) tags.push('yaml');
  if (hasTerraform) tags.push('terraform');

  if (tags.length > 0) {
    return { category: 'config', tags };
  }
  return { category: 'empty', tags: [] };
}
