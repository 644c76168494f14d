/** JSON-compatible value accepted as a tool argument. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Argument mapping forwarded verbatim to a tool invocation. */
export type ToolArguments = Record<string, JsonValue>;

/**
 * Launch description of one worker. Stored frozen by the coordinator; a new
 * registration under the same name replaces it.
 */
export interface WorkerConfig {
  /** Unique identifier of the worker within a coordinator. */
  readonly name: string;
  /** Executable path or command looked up on `PATH`. */
  readonly command: string;
  /** Ordered command line arguments. */
  readonly args: readonly string[];
  /** Environment overrides applied on top of the inherited allow-list. */
  readonly env?: Readonly<Record<string, string>>;
}

/**
 * JSON Schema describing a tool's parameters. Only used for discovery and
 * documentation; the coordinator never validates arguments against it.
 */
export interface ToolInputSchema {
  type: "object";
  properties?: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
}

/** Tool advertised by a worker during discovery. */
export interface ToolDescriptor {
  readonly name: string;
  /** Human readable description; empty when the worker omits it. */
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
}

/** Entry of the merged catalog returned by `listAllTools`. */
export interface ToolRecord extends ToolDescriptor {
  /** Name of the worker owning the tool. */
  readonly workerName: string;
}

/** Flattened view of one parameter declared in a {@link ToolInputSchema}. */
export interface ToolParameter {
  name: string;
  type: string;
  description: string;
  required: boolean;
  default?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Flattens the `properties`/`required` pair of a tool schema into one record
 * per parameter, in declaration order. Parameters without a declared type are
 * reported as `"unknown"`.
 */
export function describeParameters(schema: ToolInputSchema): ToolParameter[] {
  const properties = isRecord(schema.properties) ? schema.properties : {};
  const required = new Set(Array.isArray(schema.required) ? schema.required : []);

  return Object.entries(properties).map(([name, raw]) => {
    const property = isRecord(raw) ? raw : {};
    const parameter: ToolParameter = {
      name,
      type: typeof property.type === "string" ? property.type : "unknown",
      description: typeof property.description === "string" ? property.description : "",
      required: required.has(name),
    };
    if (Object.prototype.hasOwnProperty.call(property, "default")) {
      parameter.default = property.default;
    }
    return parameter;
  });
}
