/**
 * Repository classification types
 * Categories derived from a file-tree walk, and the ecosystem variants
 * selected for code repositories
 */

import { z } from 'zod';

/**
 * Repository categories
 * - code: at least one recognised source file
 * - config: only infrastructure-as-code files (YAML, Terraform)
 * - performance-test: load-test plans present (wins over code)
 * - empty: nothing recognisable
 */
export const RepoCategorySchema = z.enum(['code', 'config', 'performance-test', 'empty']);
export type RepoCategory = z.infer<typeof RepoCategorySchema>;

/**
 * Tags describing which infrastructure-as-code kinds a config repository holds
 */
export const ConfigTagSchema = z.enum(['yaml', 'terraform']);
export type ConfigTag = z.infer<typeof ConfigTagSchema>;

/**
 * Result of classifying a repository tree. Only config repositories carry tags.
 */
export type Classification =
  | { readonly category: 'config'; readonly tags: readonly ConfigTag[] }
  | { readonly category: Exclude<RepoCategory, 'config'>; readonly tags: readonly [] };

export type JavaBuildTool = 'maven' | 'gradle';

/**
 * Build/test/scan family chosen for a code repository
 */
export type Ecosystem =
  | { readonly kind: 'java'; readonly buildTool: JavaBuildTool }
  | { readonly kind: 'dotnet'; readonly projectFile: string | null }
  | { readonly kind: 'python' }
  | { readonly kind: 'go' }
  | { readonly kind: 'generic' };

/**
 * What the dispatcher executes for one repository
 */
export type ScanPlan =
  | { readonly category: 'code'; readonly ecosystem: Ecosystem }
  | { readonly category: 'config'; readonly tags: readonly ConfigTag[] }
  | { readonly category: 'performance-test' }
  | { readonly category: 'empty' };

/**
 * Human-readable label for an ecosystem
 *
 * @param ecosystem - Selected ecosystem
 */
export function describeEcosystem(ecosystem: Ecosystem): string {
  switch (ecosystem.kind) {
    case 'java':
      return `Java (${ecosystem.buildTool})`;
    case 'dotnet':
      return ecosystem.projectFile ? `.NET (${ecosystem.projectFile})` : '.NET (no project file)';
    case 'python':
      return 'Python';
    case 'go':
      return 'Go';
    case 'generic':
      return 'generic sources';
  }
}

/**
 * Exhaustiveness guard for switch statements over closed unions
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
