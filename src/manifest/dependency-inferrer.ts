import { readFileSync } from "node:fs";
import { z } from "zod";
import { getAppKindProfile } from "../templates/catalog.js";
import { AppKind, UnmappedImportPolicy } from "../types.js";

const packageMapSchema = z.record(z.string().min(1));
const stdlibSchema = z.array(z.string().min(1));

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

let cachedPackageMap: Record<string, string> | null = null;
let cachedStdlib: Set<string> | null = null;

function readConfigJson(fileName: string): unknown {
  const url = new URL(`../../config/${fileName}`, import.meta.url);
  return JSON.parse(readFileSync(url, "utf8"));
}

export function loadPackageMap(): Record<string, string> {
  if (!cachedPackageMap) {
    cachedPackageMap = packageMapSchema.parse(readConfigJson("package-map.json"));
  }
  return cachedPackageMap;
}

export function loadStdlibModules(): Set<string> {
  if (!cachedStdlib) {
    cachedStdlib = new Set(stdlibSchema.parse(readConfigJson("python-stdlib.json")));
  }
  return cachedStdlib;
}

/** Blanks out comments and string literals so only code tokens remain. */
function stripCommentsAndStrings(source: string): string {
  let output = "";
  let index = 0;

  while (index < source.length) {
    const char = source[index];

    if (char === "#") {
      while (index < source.length && source[index] !== "\n") {
        index += 1;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      const delimiter = source.startsWith(char.repeat(3), index) ? char.repeat(3) : char;
      index += delimiter.length;

      while (index < source.length) {
        if (source[index] === "\\") {
          index += 2;
          continue;
        }
        if (source.startsWith(delimiter, index)) {
          index += delimiter.length;
          break;
        }
        if (delimiter.length === 1 && source[index] === "\n") {
          break;
        }
        index += 1;
      }

      output += '""';
      continue;
    }

    output += char;
    index += 1;
  }

  return output;
}

/** Joins bracketed and backslash-continued lines, then splits on `;`. */
function splitStatements(code: string): string[] {
  const statements: string[] = [];
  let current = "";
  let depth = 0;

  for (let index = 0; index < code.length; index += 1) {
    const char = code[index];

    if (char === "(" || char === "[" || char === "{") {
      depth += 1;
    } else if ((char === ")" || char === "]" || char === "}") && depth > 0) {
      depth -= 1;
    }

    if (char === "\\" && code[index + 1] === "\n") {
      current += " ";
      index += 1;
      continue;
    }

    if (char === "\n") {
      if (depth > 0) {
        current += " ";
        continue;
      }
      statements.push(current);
      current = "";
      continue;
    }

    if (char === ";" && depth === 0) {
      statements.push(current);
      current = "";
      continue;
    }

    current += char;
  }

  statements.push(current);
  return statements.map((statement) => statement.trim()).filter(Boolean);
}

function topLevel(moduleName: string): string | null {
  const head = moduleName.trim().split(".")[0] ?? "";
  return IDENTIFIER.test(head) ? head : null;
}

/**
 * Top-level module names referenced by `import` and `from … import`
 * statements, in first-seen order. Relative imports are skipped.
 */
export function extractImports(source: string): string[] {
  const found = new Set<string>();

  for (const statement of splitStatements(stripCommentsAndStrings(source))) {
    const fromMatch = /^from\s+(\S+)\s+import\b/.exec(statement);
    if (fromMatch) {
      const moduleName = fromMatch[1] ?? "";
      if (moduleName.startsWith(".")) {
        continue;
      }
      const name = topLevel(moduleName);
      if (name) {
        found.add(name);
      }
      continue;
    }

    const importMatch = /^import\s+(.+)$/.exec(statement);
    if (!importMatch) {
      continue;
    }

    for (const clause of (importMatch[1] ?? "").split(",")) {
      const moduleName = clause.trim().split(/\s+/)[0] ?? "";
      const name = topLevel(moduleName);
      if (name) {
        found.add(name);
      }
    }
  }

  return Array.from(found);
}

export interface InferRequirementsOptions {
  policy?: UnmappedImportPolicy;
  packageMap?: Record<string, string>;
  stdlibModules?: Set<string>;
}

/**
 * Installable package names for `source`. The kind's UI toolkit and runtime
 * packages always lead the list whether or not the code imports them.
 */
export function inferPackages(source: string, kind: AppKind, options: InferRequirementsOptions = {}): string[] {
  const policy = options.policy ?? "drop";
  const packageMap = options.packageMap ?? loadPackageMap();
  const stdlib = options.stdlibModules ?? loadStdlibModules();
  const profile = getAppKindProfile(kind);

  const packages: string[] = [];
  const seen = new Set<string>();
  const add = (name: string) => {
    const key = name.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      packages.push(name);
    }
  };

  add(profile.toolkitPackage);
  profile.runtimePackages.forEach(add);

  for (const moduleName of extractImports(source)) {
    const mapped = Object.hasOwn(packageMap, moduleName) ? packageMap[moduleName] : undefined;
    if (mapped) {
      add(mapped);
      continue;
    }
    if (policy === "passthrough" && !stdlib.has(moduleName)) {
      add(moduleName);
    }
  }

  return packages;
}

export function inferRequirements(source: string, kind: AppKind, options: InferRequirementsOptions = {}): string {
  return inferPackages(source, kind, options).join("\n");
}
