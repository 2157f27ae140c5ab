/**
 * Test suite for StructureAnalyzer
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { annotate, t } from "../tooling/lib/descriptors";
import { Logger } from "../tooling/lib/logger";
import { ancestorChain, referencesClass, StructureAnalyzer } from "../tooling/lib/structure-analyzer";
import { SignatureCatalog } from "../tooling/lib/types";
import { isConstructor } from "../tooling/lib/utils";

class Base {
  greet(): string {
    return "hi";
  }

  describe(): string {
    return "base";
  }

  get label(): string {
    return "label";
  }

  static build(): Base {
    return new this();
  }

  static version(): number {
    return 1;
  }
}

class Derived extends Base {
  describe(): string {
    return "derived";
  }

  static version(): number {
    return 2;
  }
}

class Bag {
  size(): number {
    return 0;
  }

  toString(): string {
    return "bag";
  }

  *[Symbol.iterator](): Generator<number> {
    yield 1;
  }
}

class Vault {
  open(): boolean {
    return true;
  }

  lock(): boolean {
    return false;
  }

  _peek(): string {
    return "inside";
  }
}

const vaultCatalog: SignatureCatalog = {
  functions: {},
  classes: {
    Vault: {
      name: "Vault",
      methods: {
        lock: {
          name: "lock",
          parameters: [],
          returnType: t.boolean(),
          isStatic: false,
          usesThis: false,
          visibility: "private",
        },
      },
      accessors: {},
    },
  },
};

describe("StructureAnalyzer", () => {
  let logger: Logger;
  let analyzer: StructureAnalyzer;

  beforeEach(() => {
    logger = new Logger("debug", false);
    analyzer = new StructureAnalyzer({ logger });
  });

  it("should attribute each member to the nearest class defining it", () => {
    const description = analyzer.analyze(Derived);

    expect(description.baseClasses).toEqual(["Base"]);
    expect(Array.from(description.instanceMethods.keys())).toEqual(["describe", "greet"]);
    expect(description.instanceMethods.get("describe")?.definedIn).toBe("Derived");
    expect(description.instanceMethods.get("greet")?.definedIn).toBe("Base");
  });

  it("should split static methods by whether they use the class", () => {
    const description = analyzer.analyze(Derived);

    expect(Array.from(description.classBoundMethods.keys())).toEqual(["build"]);
    expect(Array.from(description.noInstanceMethods.keys())).toEqual(["version"]);
    expect(description.noInstanceMethods.get("version")?.definedIn).toBe("Derived");
  });

  it("should not count this inside strings or comments", () => {
    class Notes {
      static title(): string {
        // this is plain text
        return "this";
      }
    }

    expect(Array.from(analyzer.analyze(Notes).noInstanceMethods.keys())).toEqual(["title"]);
  });

  it("should collect accessors as properties", () => {
    const description = analyzer.analyze(Derived);

    expect(description.properties.get("label")).toEqual({
      name: "label",
      type: t.unknown(),
      hasGetter: true,
      hasSetter: false,
      definedIn: "Base",
    });
  });

  it("should keep every member in exactly one bucket", () => {
    const description = analyzer.analyze(Derived);
    const names = [
      ...description.instanceMethods.keys(),
      ...description.classBoundMethods.keys(),
      ...description.noInstanceMethods.keys(),
      ...description.properties.keys(),
      ...description.specialMembers.keys(),
    ];

    expect(new Set(names).size).toBe(names.length);
  });

  it("should set conversion and symbol members apart", () => {
    const description = analyzer.analyze(Bag);

    expect(Array.from(description.instanceMethods.keys())).toEqual(["size"]);
    expect(Array.from(description.specialMembers.keys())).toEqual(["toString", "Symbol(Symbol.iterator)"]);
  });

  it("should hide underscore and non-public members", () => {
    const description = new StructureAnalyzer({ catalog: vaultCatalog, logger }).analyze(Vault);

    expect(Array.from(description.instanceMethods.keys())).toEqual(["open"]);
  });

  describe("constructor resolution", () => {
    it("should prefer an annotation", () => {
      class Sized {
        constructor(public size: number) {}
      }
      annotate(Sized, { parameters: [{ name: "size", type: t.integer() }] });

      expect(analyzer.analyze(Sized).ctor).toEqual({
        parameters: [{ name: "size", type: t.integer(), optional: false }],
        definedIn: "Sized",
      });
    });

    it("should inherit a catalogued base constructor", () => {
      class Parent {
        constructor(public value: string) {}
      }
      class Child extends Parent {}
      const catalog: SignatureCatalog = {
        functions: {},
        classes: {
          Parent: {
            name: "Parent",
            constructorParameters: [{ name: "value", type: t.text(), optional: false }],
            methods: {},
            accessors: {},
          },
          Child: { name: "Child", baseName: "Parent", methods: {}, accessors: {} },
        },
      };

      expect(new StructureAnalyzer({ catalog, logger }).analyze(Child).ctor).toEqual({
        parameters: [{ name: "value", type: t.text(), optional: false }],
        definedIn: "Parent",
      });
    });

    it("should fall back to the constructor arity", () => {
      class Pair {
        constructor(public left: unknown, public right: unknown) {}
      }

      expect(analyzer.analyze(Pair).ctor).toEqual({
        parameters: [
          { name: "arg0", type: t.unknown(), optional: false },
          { name: "arg1", type: t.unknown(), optional: false },
        ],
        definedIn: "Pair",
      });
    });
  });

  describe("faults", () => {
    it("should skip a member that cannot be inspected", () => {
      function Faulty(this: unknown): void {}
      Faulty.prototype = new Proxy(
        {},
        {
          ownKeys: () => ["ok", "bad"],
          getOwnPropertyDescriptor: (_target, key) => {
            if (key === "bad") {
              throw new Error("unreadable");
            }
            return { value: () => 1, configurable: true, enumerable: true, writable: true };
          },
        }
      );
      const faulty: unknown = Faulty;
      if (!isConstructor(faulty)) {
        throw new Error("expected a constructor");
      }

      const description = analyzer.analyze(faulty);

      expect(description.error).toBeUndefined();
      expect(Array.from(description.instanceMethods.keys())).toEqual(["ok"]);
      expect(logger.getEntriesAtLevel("warn").map((entry) => entry.message)).toEqual(["Skipped Faulty.bad"]);
    });

    it("should describe a class it cannot walk by name only", () => {
      class Broken {
        run(): number {
          return 1;
        }
      }
      const guarded = new Proxy(Broken, {
        getPrototypeOf: () => {
          throw new Error("no chain");
        },
      });

      const description = analyzer.analyze(guarded);

      expect(description.name).toBe("Broken");
      expect(description.error).toBe("no chain");
      expect(description.instanceMethods.size).toBe(0);
      expect(logger.getEntriesAtLevel("error").map((entry) => entry.message)).toEqual([
        "Could not analyze class Broken",
      ]);
    });
  });

  describe("referencesClass", () => {
    it("should find this and super in code only", () => {
      expect(referencesClass("build() { return new this(); }")).toBe(true);
      expect(referencesClass("() => this.count")).toBe(true);
      expect(referencesClass('label() { return "this"; }')).toBe(false);
      expect(referencesClass("note() {\n  // uses this\n  return 1;\n}")).toBe(false);
    });

    it("should fall back to a word match for source that does not parse", () => {
      expect(referencesClass("function () { [native code] }")).toBe(false);
      expect(referencesClass("this is not code")).toBe(true);
    });
  });

  describe("ancestorChain", () => {
    it("should list the class and its ancestors", () => {
      expect(ancestorChain(Derived)).toEqual([Derived, Base]);
      expect(ancestorChain(Base)).toEqual([Base]);
    });
  });
});
