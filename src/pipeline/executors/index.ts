/**
 * Ecosystem executors
 */

export * from './shared.js';
export { runJavaScan } from './java.js';
export { runDotnetScan, GENERATED_PROJECT_FILE } from './dotnet.js';
export { runPythonScan } from './python.js';
export { runGoScan } from './go.js';
export { runGenericScan, genericScanProperties, type GenericScanMode } from './generic.js';
