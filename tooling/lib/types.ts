/**
 * Shared type definitions for the case generator
 */

export type ScalarKind = "integer" | "float" | "text" | "boolean";

export type TypeDescriptor =
  | { kind: "scalar"; scalar: ScalarKind }
  | { kind: "collection"; container: "array" | "set"; element: TypeDescriptor }
  | { kind: "tuple"; elements: TypeDescriptor[] }
  | { kind: "mapping"; container: "record" | "map"; key: TypeDescriptor; value: TypeDescriptor }
  | { kind: "userClass"; name: string }
  | { kind: "unknown"; text?: string };

export type ParameterDescriptor = {
  name: string;
  type: TypeDescriptor;
  optional: boolean;
};

export type Visibility = "public" | "protected" | "private";

export type CallableSignature = {
  name: string;
  parameters: ParameterDescriptor[];
  returnType: TypeDescriptor;
};

export type MethodSignature = CallableSignature & {
  isStatic: boolean;
  usesThis: boolean;
  visibility: Visibility;
};

export type AccessorSignature = {
  name: string;
  type: TypeDescriptor;
  hasGetter: boolean;
  hasSetter: boolean;
  isStatic: boolean;
  visibility: Visibility;
};

export type ClassSignature = {
  name: string;
  baseName?: string;
  // undefined when the class declares no constructor of its own
  constructorParameters?: ParameterDescriptor[];
  methods: Record<string, MethodSignature>;
  accessors: Record<string, AccessorSignature>;
};

export type SignatureCatalog = {
  functions: Record<string, CallableSignature>;
  classes: Record<string, ClassSignature>;
};

export type ConstructorDescriptor = {
  parameters: ParameterDescriptor[];
  definedIn: string;
};

export type MethodDescriptor = {
  name: string;
  parameters: ParameterDescriptor[];
  returnType: TypeDescriptor;
  definedIn: string;
};

export type ClassPropertyDescriptor = {
  name: string;
  type: TypeDescriptor;
  hasGetter: boolean;
  hasSetter: boolean;
  definedIn: string;
};

export type ClassDescription = {
  name: string;
  baseClasses: string[];
  ctor?: ConstructorDescriptor;
  instanceMethods: Map<string, MethodDescriptor>;
  classBoundMethods: Map<string, MethodDescriptor>;
  noInstanceMethods: Map<string, MethodDescriptor>;
  properties: Map<string, ClassPropertyDescriptor>;
  specialMembers: Map<string, MethodDescriptor>;
  error?: string;
};

export type ClassConstructor = new (...args: never[]) => unknown;

export type AnyCallable = (...args: never[]) => unknown;

export type DeadlineMode = "vm" | "none";

export type Config = {
  envSearchPaths?: string[];
  numRandomCases?: number;
  perCallDeadlineSeconds?: number;
  maxConstructionAttempts?: number;
  seed?: number;
  deadlineMode?: DeadlineMode;
  numberKind?: "integer" | "float";
  outputDir?: string;
};

export type Outcome =
  | { status: "returned"; value: unknown }
  | { status: "raised"; errorKind: string; message: string }
  | { status: "timedOut"; elapsedMs: number };
