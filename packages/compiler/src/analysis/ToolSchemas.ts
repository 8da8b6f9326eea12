import type { JsonTypeName } from "@respc/shared";

export interface ToolParameterSchema {
  type: JsonTypeName | JsonTypeName[];
  required?: boolean;
  /** Alternate names models use for the same parameter. */
  aliases?: string[];
}

export interface ToolSchema {
  name: string;
  parameters: Record<string, ToolParameterSchema>;
}

/**
 * Lookup of known tools. The analyzer treats tools missing from the catalog
 * as unknown rather than invalid; hosts inject their real tool catalog.
 */
export interface ToolSchemaCatalog {
  get(toolName: string): ToolSchema | undefined;
  list(): ToolSchema[];
}

export class StaticToolSchemaCatalog implements ToolSchemaCatalog {
  private schemas = new Map<string, ToolSchema>();

  constructor(schemas: ToolSchema[] = []) {
    for (const schema of schemas) {
      this.schemas.set(schema.name, schema);
    }
  }

  get(toolName: string): ToolSchema | undefined {
    return this.schemas.get(toolName);
  }

  list(): ToolSchema[] {
    return Array.from(this.schemas.values());
  }

  /** New catalog with `schemas` added, replacing same-named entries. */
  extend(schemas: ToolSchema[]): StaticToolSchemaCatalog {
    return new StaticToolSchemaCatalog([...this.list(), ...schemas]);
  }
}

export const BUILTIN_TOOL_SCHEMAS: ToolSchema[] = [
  {
    name: "write_file",
    parameters: {
      path: { type: "string", required: true, aliases: ["file_path"] },
      content: { type: "string", required: true },
    },
  },
  {
    name: "read_file",
    parameters: {
      path: { type: "string", required: true, aliases: ["file_path"] },
    },
  },
  {
    name: "list_directory",
    parameters: {
      path: { type: "string", required: true, aliases: ["directory"] },
      recursive: { type: "boolean" },
    },
  },
  {
    name: "execute_command",
    parameters: {
      command: { type: "string", required: true },
      working_directory: { type: "string" },
    },
  },
];

export const defaultToolSchemaCatalog = new StaticToolSchemaCatalog(BUILTIN_TOOL_SCHEMAS);
