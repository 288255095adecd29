import type {
  Command,
  CreateCommand,
  DirectiveWarning,
  ModelType,
  ParseResult,
} from "./types.js";
import { MODEL_TYPES } from "./types.js";

// Bullets and numbering models like to put in front of directives
const LIST_MARKER = /^(?:[-*•]|\d+[.)])\s+/;
const ANALYZE_RE = /^ANALYZE:\s*(.*)$/;
const CREATE_RE = /^CREATE:\s*(.*)$/;
const ROUTE_RE = /^TO\s+([^:]+?)\s*:\s*(.*)$/;
// Trailing text after "SYNTHESIZE:" or "SYNTHESIZE " is ignored
const SYNTHESIZE_RE = /^SYNTHESIZE(?::.*|\s.*)?$/;

type LineKind = "analyze" | "create" | "route_to" | "synthesize";

function stripListMarker(line: string): string {
  return line.replace(LIST_MARKER, "");
}

function keywordOf(line: string): LineKind | null {
  if (line.startsWith("ANALYZE:")) return "analyze";
  if (line.startsWith("CREATE:")) return "create";
  if (line.startsWith("TO ")) return "route_to";
  if (SYNTHESIZE_RE.test(line)) return "synthesize";
  return null;
}

function toModelType(value: string): ModelType | null {
  const lower = value.trim().toLowerCase();
  return MODEL_TYPES.find((t) => t === lower) ?? null;
}

/**
 * Parses one CREATE payload. Accepts `role | model_type | responsibility`
 * and the short forms `role | model_type`, `role | responsibility`, `role`.
 */
function parseCreatePayload(
  payload: string,
  line: number,
  text: string,
): { command: CreateCommand } | { warning: DirectiveWarning } {
  const parts = payload.split("|").map((p) => p.trim());
  const role = parts[0] ?? "";

  if (!role || parts.length > 3) {
    return {
      warning: { kind: "malformed_create", line, text, detail: "expected role | model_type | responsibility" },
    };
  }

  if (parts.length === 1) {
    return { command: { kind: "create", role, modelType: "normal", responsibility: "", line } };
  }

  if (parts.length === 2) {
    const modelType = toModelType(parts[1]);
    return {
      command: modelType
        ? { kind: "create", role, modelType, responsibility: "", line }
        : { kind: "create", role, modelType: "normal", responsibility: parts[1], line },
    };
  }

  const modelType = toModelType(parts[1]);
  if (!modelType) {
    return {
      warning: { kind: "unknown_model_type", line, text, detail: parts[1] },
    };
  }
  return { command: { kind: "create", role, modelType, responsibility: parts[2], line } };
}

/**
 * Parses a mother-agent response into directives.
 *
 * Pure and total: formatting drift becomes warnings, and the only failures
 * are structural ones (no terminal SYNTHESIZE, or commands after it).
 * Line numbers in commands and warnings are 1-based.
 */
export function parseDirectives(raw: string): ParseResult {
  const lines = raw.split(/\r?\n/);
  const commands: Command[] = [];
  const warnings: DirectiveWarning[] = [];

  let sawAnalyze = false;
  let synthesizeLine: number | null = null;
  let inCreateBlock = false;
  let trailingCommand: number | null = null;

  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const text = stripListMarker(lines[i].trim());
    if (!text) {
      inCreateBlock = false;
      continue;
    }

    const kind = keywordOf(text);

    if (kind === null) {
      if (inCreateBlock && text.includes("|")) {
        const parsed = parseCreatePayload(text, lineNo, text);
        if ("command" in parsed) commands.push(parsed.command);
        else warnings.push(parsed.warning);
        continue;
      }
      inCreateBlock = false;
      warnings.push({ kind: "unrecognized_line", line: lineNo, text });
      continue;
    }

    inCreateBlock = false;

    if (synthesizeLine !== null) {
      if (kind === "synthesize") {
        warnings.push({ kind: "duplicate_synthesize", line: lineNo, text });
      } else {
        trailingCommand ??= lineNo;
      }
      continue;
    }

    switch (kind) {
      case "analyze": {
        const body = ANALYZE_RE.exec(text)?.[1]?.trim() ?? "";
        if (sawAnalyze) {
          warnings.push({ kind: "duplicate_analyze", line: lineNo, text });
          break;
        }
        sawAnalyze = true;
        commands.push({ kind: "analyze", text: body, line: lineNo });
        break;
      }
      case "create": {
        const payload = CREATE_RE.exec(text)?.[1]?.trim() ?? "";
        if (!payload) {
          inCreateBlock = true;
          break;
        }
        const parsed = parseCreatePayload(payload, lineNo, text);
        if ("command" in parsed) commands.push(parsed.command);
        else warnings.push(parsed.warning);
        break;
      }
      case "route_to": {
        const match = ROUTE_RE.exec(text);
        const instanceRef = match?.[1]?.trim() ?? "";
        const message = match?.[2]?.trim() ?? "";
        if (!instanceRef || !message) {
          warnings.push({
            kind: "malformed_route",
            line: lineNo,
            text,
            detail: "expected TO <instance>: <message>",
          });
          break;
        }
        commands.push({ kind: "route_to", instanceRef, message, line: lineNo });
        break;
      }
      case "synthesize":
        synthesizeLine = lineNo;
        commands.push({ kind: "synthesize", line: lineNo });
        break;
    }
  }

  if (trailingCommand !== null) {
    return {
      ok: false,
      reason: "synthesize_not_terminal",
      message: `SYNTHESIZE on line ${synthesizeLine} must be the last directive, found another on line ${trailingCommand}`,
      commands,
      warnings,
    };
  }

  if (synthesizeLine === null && raw.trim().length > 0) {
    return {
      ok: false,
      reason: "missing_synthesize",
      message: "Directive block does not end with SYNTHESIZE",
      commands,
      warnings,
    };
  }

  return { ok: true, commands, warnings };
}

/** One-line description of a warning for logs and turn results. */
export function formatWarning(warning: DirectiveWarning): string {
  const labels: Record<DirectiveWarning["kind"], string> = {
    unrecognized_line: "Ignored unrecognized line",
    unknown_model_type: "Skipped CREATE with unknown model type",
    malformed_create: "Skipped malformed CREATE",
    malformed_route: "Skipped malformed TO",
    duplicate_analyze: "Ignored repeated ANALYZE",
    duplicate_synthesize: "Ignored repeated SYNTHESIZE",
  };
  const detail = warning.detail ? ` (${warning.detail})` : "";
  return `${labels[warning.kind]} on line ${warning.line}${detail}: ${warning.text}`;
}
