/**
 * File extension sets used for classification and ecosystem detection.
 * The three classification sets are disjoint.
 */

/** Load-test plans (JMeter) */
export const PERFORMANCE_TEST_EXTENSIONS = new Set(['.jmx']);

/** Mainstream compiled and interpreted languages */
export const SOURCE_CODE_EXTENSIONS = new Set([
  '.java', '.kt', '.kts', '.scala', '.groovy',
  '.cs', '.vb', '.fs',
  '.py',
  '.go',
  '.js', '.jsx', '.mjs', '.cjs', '.ts', '.tsx',
  '.rb', '.php',
  '.c', '.h', '.cc', '.cpp', '.cxx', '.hpp',
  '.m', '.mm', '.swift',
  '.rs', '.dart', '.lua', '.pl', '.r',
  '.sh', '.ps1',
]);

export const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);

export const TERRAFORM_EXTENSIONS = new Set(['.tf', '.tfvars']);

/** Java build descriptors looked for at the repository root, in order */
export const JAVA_BUILD_DESCRIPTORS = [
  { file: 'pom.xml', buildTool: 'maven' },
  { file: 'build.gradle', buildTool: 'gradle' },
  { file: 'build.gradle.kts', buildTool: 'gradle' },
] as const;

export const DOTNET_SOLUTION_EXTENSIONS = new Set(['.sln']);
export const DOTNET_PROJECT_EXTENSIONS = new Set(['.csproj', '.vbproj', '.fsproj']);
export const DOTNET_SOURCE_EXTENSIONS = new Set(['.cs']);

export const PYTHON_SOURCE_EXTENSIONS = new Set(['.py']);

export const GO_MODULE_FILE = 'go.mod';
export const GO_SOURCE_EXTENSIONS = new Set(['.go']);

/** Inclusion patterns for config-only scans, per tag */
export const CONFIG_INCLUSIONS = {
  yaml: ['**/*.yaml', '**/*.yml'],
  terraform: ['**/*.tf', '**/*.tfvars'],
} as const;

/** Inclusion patterns for performance-test scans */
export const PERFORMANCE_TEST_INCLUSIONS = ['**/*.jmx', '**/*.properties'];
