import type { JsonObject, JsonValue } from "@respc/shared";
import type { NodeKind, ResponseChild, ResponseNode, ToolArguments } from "../ast/ResponseNodes.js";

export type Visibility = "hidden" | "summary" | "full";

export interface RenderOptions {
  visibility?: Partial<Record<NodeKind, Visibility>>;
  separator?: string;
  /** Indentation for JSON in full tool call and result output; 0 prints compact JSON. */
  jsonIndent?: number;
}

export interface ToolInvocation {
  toolName: string;
  arguments: ToolArguments;
  callId: string;
}

export interface RenderOutput {
  text: string;
  toolInvocations: ToolInvocation[];
  hasContent: boolean;
  hasToolCalls: boolean;
}

// Annotation kinds repeat text the Text node already carries.
export const DEFAULT_VISIBILITY: Record<NodeKind, Visibility> = {
  text: "full",
  code: "full",
  tool_call: "hidden",
  tool_result: "hidden",
  thought: "hidden",
  file_reference: "hidden",
  question: "hidden",
  command: "hidden",
  markdown: "hidden",
  error: "hidden",
};

const countLines = (code: string): number => (code ? code.split("\n").length : 0);

const fence = (language: string, code: string): string => {
  const longest = Math.max(0, ...Array.from(code.matchAll(/`{3,}/g), (match) => match[0].length));
  const marker = "`".repeat(Math.max(3, longest + 1));
  return `${marker}${language}\n${code}\n${marker}`;
};

export class AstRenderer {
  render(tree: ResponseNode, options: RenderOptions = {}): RenderOutput {
    const visibility = { ...DEFAULT_VISIBILITY, ...options.visibility };
    const separator = options.separator ?? "\n\n";
    const indent = options.jsonIndent ?? 2;
    const parts: string[] = [];
    const toolInvocations: ToolInvocation[] = [];

    for (const node of tree.children) {
      if (node.kind === "tool_call") {
        toolInvocations.push({ toolName: node.toolName, arguments: node.arguments, callId: node.callId });
      }
      const mode = visibility[node.kind];
      if (mode === "hidden") continue;
      const rendered = this.renderNode(node, mode, indent);
      if (rendered.trim()) parts.push(rendered);
    }

    const text = parts.join(separator);
    return {
      text,
      toolInvocations,
      hasContent: text.trim() !== "",
      hasToolCalls: toolInvocations.length > 0,
    };
  }

  private renderNode(node: ResponseChild, mode: "summary" | "full", indent: number): string {
    const json = (value: JsonValue | JsonObject): string => JSON.stringify(value, null, indent || undefined);
    switch (node.kind) {
      case "text":
        return mode === "full" ? node.content : node.content.split("\n")[0];
      case "code":
        if (mode === "summary") {
          return `[code${node.language ? `: ${node.language}` : ""}, ${countLines(node.code)} lines]`;
        }
        return fence(node.language, node.code);
      case "tool_call":
        return mode === "full" ? `[tool: ${node.toolName}] ${json(node.arguments)}` : `[tool: ${node.toolName}]`;
      case "tool_result": {
        const status = node.success ? "ok" : `failed${node.errorMessage ? `: ${node.errorMessage}` : ""}`;
        const head = `[result: ${node.toolName}] ${status}`;
        return mode === "full" && node.result !== undefined ? `${head}\n${json(node.result)}` : head;
      }
      case "thought":
        return mode === "full" ? node.content : "[thought]";
      case "file_reference": {
        const location = node.lineReference ? `${node.path}:${node.lineReference}` : node.path;
        return mode === "full" ? location : `[file: ${location}]`;
      }
      case "question": {
        const options = node.suggestedOptions?.length ? ` (${node.suggestedOptions.join("/")})` : "";
        return mode === "full" ? `${node.question}${options}` : node.question;
      }
      case "error":
        return mode === "full" ? `${node.severity.toUpperCase()}: ${node.message}` : `[${node.severity}]`;
      case "command":
        return mode === "full" ? `$ ${node.command}` : `[command: ${node.command}]`;
      case "markdown":
        if (node.element === "horizontal_rule") return node.marker;
        return mode === "full" ? `${node.marker} ${node.text}` : node.text;
    }
  }
}
