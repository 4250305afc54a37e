export { scanUsage, localPythonModules } from "./scanner.js";
export { extractPythonImports, pythonNamespaceCandidates, pythonTopLevel } from "./python.js";
export { extractJavaScriptImports, javascriptPackageName } from "./javascript.js";
export type { ImportReference, ScanOptions, ScanResult } from "./types.js";
