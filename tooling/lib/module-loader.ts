/**
 * Loads a TypeScript module for synthesis: transpiles it to CommonJS with the
 * compiler bundled in ts-morph and evaluates it with node:vm. Relative
 * imports of other .ts files go through the same loader; everything else is
 * resolved by Node.
 */

import { existsSync, readFileSync, statSync } from "node:fs";
import { createRequire } from "node:module";
import { dirname, extname, resolve } from "node:path";
import vm from "node:vm";
import { ts } from "ts-morph";
import { describeThrown, ModuleLoadError } from "./errors";
import { globalLogger, Logger } from "./logger";
import { isCallable, isPlainObject } from "./utils";

const SOURCE_EXTENSIONS = [".ts", ".tsx", ".mts", ".cts"];
const MODULE_WRAPPER_PARAMETERS = ["exports", "require", "module", "__filename", "__dirname"];

type LoadedModule = { exports: unknown };

export type ModuleLoaderOptions = {
  logger?: Logger;
  compilerOptions?: ts.CompilerOptions;
};

export class ModuleLoader {
  private cache = new Map<string, LoadedModule>();
  private logger: Logger;
  private compilerOptions: ts.CompilerOptions;

  constructor(options: ModuleLoaderOptions = {}) {
    this.logger = options.logger ?? globalLogger;
    this.compilerOptions = {
      module: ts.ModuleKind.CommonJS,
      target: ts.ScriptTarget.ES2020,
      esModuleInterop: true,
      sourceMap: false,
      ...options.compilerOptions,
    };
  }

  /**
   * Load a module and return its namespace
   */
  load(path: string): Record<string, unknown> {
    const absolute = resolve(path);
    const loaded = this.evaluate(absolute);
    return toNamespace(loaded.exports);
  }

  private evaluate(filename: string): LoadedModule {
    const cached = this.cache.get(filename);
    if (cached) {
      return cached;
    }

    const module: LoadedModule = { exports: {} };
    // registered before evaluation so import cycles see the partial exports
    this.cache.set(filename, module);

    try {
      const source = readFileSync(filename, "utf8");
      const output = ts.transpileModule(source, { compilerOptions: this.compilerOptions, fileName: filename });
      const factory: unknown = vm.compileFunction(output.outputText, MODULE_WRAPPER_PARAMETERS, { filename });
      if (!isCallable(factory)) {
        throw new Error("module wrapper did not compile to a function");
      }
      const localRequire = this.requireFrom(filename);
      Reflect.apply(factory, module.exports, [module.exports, localRequire, module, filename, dirname(filename)]);
      this.logger.debug("Loaded module", { file: filename });
      return module;
    } catch (error) {
      this.cache.delete(filename);
      if (error instanceof ModuleLoadError) {
        throw error;
      }
      throw new ModuleLoadError(filename, error);
    }
  }

  private requireFrom(filename: string): (specifier: string) => unknown {
    const nodeRequire = createRequire(filename);
    return (specifier: string): unknown => {
      if (!specifier.startsWith("./") && !specifier.startsWith("../")) {
        return nodeRequire(specifier);
      }
      const target = resolveSource(resolve(dirname(filename), specifier));
      if (target) {
        return this.evaluate(target).exports;
      }
      try {
        return nodeRequire(specifier);
      } catch (error) {
        throw new Error(`Cannot resolve ${specifier} from ${filename}: ${describeThrown(error)}`);
      }
    };
  }

  clear(): void {
    this.cache.clear();
  }
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

/**
 * The TypeScript file a relative import refers to, if any
 */
function resolveSource(base: string): string | undefined {
  if (SOURCE_EXTENSIONS.includes(extname(base)) && isFile(base)) {
    return base;
  }
  const withoutJs = base.endsWith(".js") ? base.slice(0, -3) : base;
  for (const extension of SOURCE_EXTENSIONS) {
    if (isFile(`${withoutJs}${extension}`)) {
      return `${withoutJs}${extension}`;
    }
  }
  for (const extension of SOURCE_EXTENSIONS) {
    const index = resolve(base, `index${extension}`);
    if (isFile(index)) {
      return index;
    }
  }
  return undefined;
}

function toNamespace(exported: unknown): Record<string, unknown> {
  if (isPlainObject(exported)) {
    return exported;
  }
  if ((typeof exported === "object" && exported !== null) || typeof exported === "function") {
    return { default: exported };
  }
  return {};
}
