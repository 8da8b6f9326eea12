import {
  toolCallSignature,
  type FileReferenceNode,
  type ResponseChild,
  type ResponseNode,
  type TextNode,
} from "../ast/ResponseNodes.js";
import type { Diagnostic } from "../diagnostics/Diagnostic.js";
import { detectTextFormat } from "../parsers/SemanticExtraction.js";

export interface OptimizeOptions {
  normalizeFilePaths?: boolean;
}

export interface OptimizationResult {
  tree: ResponseNode;
  diagnostics: Diagnostic[];
}

/** Backslashes become slashes; bare relative paths gain a `./` prefix. */
export const normalizeFilePath = (path: string): string => {
  const slashed = path.replace(/\\/g, "/");
  if (/^(?:[A-Za-z]:)?\//.test(slashed)) return slashed;
  if (slashed.startsWith("./") || slashed.startsWith("../")) return slashed;
  return `./${slashed}`;
};

/**
 * Rewrites a tree into a new one; the input tree and its nodes are left as
 * they were. Passes run in a fixed order: duplicate calls, text merging,
 * blank text, paths.
 */
export class AstOptimizer {
  optimize(tree: ResponseNode, options: OptimizeOptions = {}): OptimizationResult {
    const diagnostics: Diagnostic[] = [];
    let children = this.dropDuplicateCalls(tree.children, diagnostics);
    children = this.mergeAdjacentText(children);
    children = children.filter((node) => node.kind !== "text" || node.content.trim() !== "");
    if (options.normalizeFilePaths ?? true) {
      children = children.map((node) => (node.kind === "file_reference" ? this.normalizeReference(node) : node));
    }
    return {
      tree: { ...tree, metadata: { ...tree.metadata }, children },
      diagnostics,
    };
  }

  private dropDuplicateCalls(children: ResponseChild[], diagnostics: Diagnostic[]): ResponseChild[] {
    const seen = new Set<string>();
    const kept: ResponseChild[] = [];
    for (const node of children) {
      if (node.kind === "tool_call") {
        const signature = toolCallSignature(node);
        if (seen.has(signature)) {
          diagnostics.push({
            severity: "info",
            message: `Removed duplicate tool call: ${node.toolName}`,
            phase: "optimization",
            node,
          });
          continue;
        }
        seen.add(signature);
      }
      kept.push(node);
    }
    return kept;
  }

  private mergeAdjacentText(children: ResponseChild[]): ResponseChild[] {
    const merged: ResponseChild[] = [];
    for (const node of children) {
      const previous = merged[merged.length - 1];
      if (node.kind === "text" && previous?.kind === "text") {
        merged[merged.length - 1] = this.joinText(previous, node);
        continue;
      }
      merged.push(node);
    }
    return merged;
  }

  private joinText(left: TextNode, right: TextNode): TextNode {
    const content = [left.content, right.content].filter((part) => part.trim() !== "").join(" ");
    return {
      kind: "text",
      span: { start: left.span.start, end: Math.max(left.span.end, right.span.end) },
      content,
      format: detectTextFormat(content),
    };
  }

  private normalizeReference(node: FileReferenceNode): FileReferenceNode {
    const path = normalizeFilePath(node.path);
    return path === node.path ? node : { ...node, path };
  }
}
