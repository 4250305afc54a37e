import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { z } from "zod";

import { normalizePythonName } from "./manifest/names.js";

const DATA_DIR = fileURLToPath(new URL("../data/", import.meta.url));

function readData<T>(fileName: string, schema: z.ZodType<T>): T {
  const raw: unknown = JSON.parse(readFileSync(`${DATA_DIR}${fileName}`, "utf-8"));
  return schema.parse(raw);
}

let stdlibCache: ReadonlySet<string> | null = null;
let aliasCache: ReadonlyMap<string, string> | null = null;

/** Top-level modules shipped with the Python standard library (normalized) */
export function pythonStdlibModules(): ReadonlySet<string> {
  stdlibCache ??= new Set(
    readData("python-stdlib.json", z.array(z.string())).map(normalizePythonName)
  );
  return stdlibCache;
}

/** Well-known import names whose distribution is published under another name */
export function builtinModuleAliases(): ReadonlyMap<string, string> {
  aliasCache ??= new Map(
    Object.entries(readData("module-aliases.json", z.record(z.string()))).map(
      ([moduleName, distribution]): [string, string] => [
        normalizePythonName(moduleName),
        normalizePythonName(distribution),
      ]
    )
  );
  return aliasCache;
}
