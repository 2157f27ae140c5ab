/**
 * Test suite for ModuleLoader
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ModuleLoadError } from "../tooling/lib/errors";
import { Logger } from "../tooling/lib/logger";
import { ModuleLoader } from "../tooling/lib/module-loader";
import { isCallable, isClassDeclaration } from "../tooling/lib/utils";

describe("ModuleLoader", () => {
  let directory: string;
  let loader: ModuleLoader;

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), "module-loader-"));
    mkdirSync(join(directory, "shared"));
    writeFileSync(
      join(directory, "helper.ts"),
      "export const double = (n: number): number => n * 2;\n",
      "utf8"
    );
    writeFileSync(join(directory, "shared", "index.ts"), "export const unit: string = 'cm';\n", "utf8");
    writeFileSync(
      join(directory, "main.ts"),
      [
        'import { join } from "path";',
        'import { double } from "./helper";',
        'import { unit } from "./shared";',
        "",
        "export function quad(n: number): number {",
        "  return double(double(n));",
        "}",
        "",
        "export class Ruler {",
        "  constructor(public length: number) {}",
        "}",
        "",
        'export const joined: string = join("a", "b");',
        "export const label = `10 ${unit}`;",
        "",
      ].join("\n"),
      "utf8"
    );
    writeFileSync(join(directory, "broken.ts"), 'throw new Error("load failure");\n', "utf8");
    loader = new ModuleLoader({ logger: new Logger("debug", false) });
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it("should expose the exports of a TypeScript module", () => {
    const namespace = loader.load(join(directory, "main.ts"));

    expect(Object.keys(namespace).sort()).toEqual(["Ruler", "joined", "label", "quad"]);
    expect(isClassDeclaration(namespace.Ruler)).toBe(true);
    expect(namespace.joined).toBe(join("a", "b"));
  });

  it("should load relative TypeScript imports through the loader", () => {
    const namespace = loader.load(join(directory, "main.ts"));
    const quad = namespace.quad;

    expect(isCallable(quad) ? Reflect.apply(quad, undefined, [3]) : undefined).toBe(12);
    expect(namespace.label).toBe("10 cm");
  });

  it("should return the cached namespace on a second load", () => {
    const first = loader.load(join(directory, "main.ts"));
    const second = loader.load(join(directory, "main.ts"));

    expect(second.quad).toBe(first.quad);
  });

  it("should wrap evaluation errors in ModuleLoadError", () => {
    const path = join(directory, "broken.ts");

    expect(() => loader.load(path)).toThrow(ModuleLoadError);
    expect(() => loader.load(path)).toThrow(`Failed to load ${path}: load failure`);
  });
});
