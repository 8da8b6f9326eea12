import { noopLogger, type EventLogger } from "@respc/shared";

export interface HallucinationReport {
  isHallucinating: boolean;
  hasFakeToolResults: boolean;
  hasFakeFileContent: boolean;
  hasFakeDirectoryListing: boolean;
  hasUnsubstantiatedClaims: boolean;
  hasSuspiciousCodeBlocks: boolean;
  issues: string[];
  suggestedAction?: string;
}

const FAKE_TOOL_RESULT = /\[Tool Results?\]|\[Tool Execution\]|\[Output\]|\[Result\]|<<<[^\n]*?>>>|```tool[\s\S]*?```/gi;
const FAKE_FILE_CONTENT =
  /(?:Here(?:'s| is) (?:the )?(?:content|code)|The (?:file|code) contains?|File contents?:)[^\n]*\n?```[\s\S]*?```/i;
const CLAIM_WITHOUT_ACTION = /(?:I've |I have |I |Let me )(?:read|checked|looked at|examined|found|executed|ran|listed)/gi;
const FAKE_DIRECTORY = /├──|└──|│\s+|Directory listing:|Files? found:/;
const CODE_BLOCK = /```(\w+)?[ \t]*\n?([\s\S]*?)```/g;
const COMPLETE_CODE_MIN_LENGTH = 100;

const looksLikeCompleteCode = (code: string): boolean => {
  if (code.trim().length < COMPLETE_CODE_MIN_LENGTH) return false;
  return (
    /^\s*(?:public|private|internal)?\s*(?:class|interface|namespace)\s+\w+/m.test(code) ||
    /^\s*(?:def|class)\s+\w+/m.test(code) ||
    /^\s*(?:export|module\.exports)/m.test(code)
  );
};

/** Flags responses that describe tool output the model never requested. */
export class HallucinationDetector {
  private readonly logger: EventLogger;

  constructor(logger: EventLogger = noopLogger) {
    this.logger = logger;
  }

  check(response: string, hadToolCalls: boolean): HallucinationReport {
    const report: HallucinationReport = {
      isHallucinating: false,
      hasFakeToolResults: false,
      hasFakeFileContent: false,
      hasFakeDirectoryListing: false,
      hasUnsubstantiatedClaims: false,
      hasSuspiciousCodeBlocks: false,
      issues: [],
    };
    if (!response.trim()) return report;

    if (new RegExp(FAKE_TOOL_RESULT.source, "i").test(response)) {
      report.hasFakeToolResults = true;
      report.issues.push("Response contains fake tool result markers such as [Tool Results]");
    }
    if (!hadToolCalls) {
      if (FAKE_FILE_CONTENT.test(response)) {
        report.hasFakeFileContent = true;
        report.issues.push("Response shows file content without a tool call");
      }
      const claims = Array.from(response.matchAll(CLAIM_WITHOUT_ACTION)).length;
      if (claims > 0) {
        report.hasUnsubstantiatedClaims = true;
        report.issues.push(`Response claims ${claims} action(s) without tool calls`);
      }
      if (FAKE_DIRECTORY.test(response)) {
        report.hasFakeDirectoryListing = true;
        report.issues.push("Response contains a directory listing without a list_directory call");
      }
      for (const block of response.matchAll(CODE_BLOCK)) {
        if (!looksLikeCompleteCode(block[2])) continue;
        report.hasSuspiciousCodeBlocks = true;
        report.issues.push(`Response contains complete ${block[1] ?? "untagged"} code without a read_file call`);
      }
    }

    report.isHallucinating =
      report.hasFakeToolResults ||
      report.hasFakeFileContent ||
      report.hasFakeDirectoryListing ||
      report.hasSuspiciousCodeBlocks ||
      (report.hasUnsubstantiatedClaims && report.issues.length > 1);
    if (report.isHallucinating) {
      report.suggestedAction = "Retry the request with stricter tool-use instructions.";
      this.logger.log("hallucination_detected", { issues: report.issues });
    }
    return report;
  }

  /** Strips fake tool output markers and directory drawings from text. */
  clean(response: string): string {
    if (!response.trim()) return response;
    return response
      .replace(FAKE_TOOL_RESULT, "")
      .replace(/\[(?:Tool |Output|Result|File)[^\]\n]*\][\s\S]*?(?=\n\n|$)/gi, "")
      .replace(/(?:├──|└──|│)[^\n]*\n?/g, "")
      .replace(/\n{3,}/g, "\n\n")
      .trim();
  }
}
