import type { ValidationResult } from "../report/types.js";
import { isObject } from "../utils/tokens.js";

export const VALID_ROLES = ["system", "user", "assistant", "function"] as const;
export type Role = (typeof VALID_ROLES)[number];

export interface ChatMessage {
  role: Role;
  content: string;
}

export interface TrainingExample {
  messages: ChatMessage[];
}

export type Decoded<T> =
  | { ok: true; value: T; warnings: string[] }
  | { ok: false; errors: string[]; warnings: string[] };

class Diagnostics {
  readonly errors: string[] = [];
  readonly warnings: string[] = [];

  constructor(private lineNumber: number) {}

  error(msg: string) {
    this.errors.push(`Line ${this.lineNumber}: ${msg}`);
  }

  warn(msg: string) {
    this.warnings.push(`Line ${this.lineNumber}: ${msg}`);
  }

  result<T>(value: T): Decoded<T> {
    if (this.errors.length > 0) {
      return { ok: false, errors: this.errors, warnings: this.warnings };
    }
    return { ok: true, value, warnings: this.warnings };
  }
}

export function isRole(v: unknown): v is Role {
  return VALID_ROLES.some((r) => r === v);
}

function formatValue(v: unknown): string {
  return typeof v === "string" ? v : JSON.stringify(v);
}

export function decodeExample(
  data: unknown,
  lineNumber: number
): Decoded<TrainingExample> {
  const diag = new Diagnostics(lineNumber);

  if (!isObject(data) || !("messages" in data)) {
    diag.error("Missing 'messages' field");
    return diag.result({ messages: [] });
  }
  const raw = data.messages;
  if (!Array.isArray(raw)) {
    diag.error("'messages' must be a list");
    return diag.result({ messages: [] });
  }
  if (raw.length === 0) {
    diag.error("'messages' cannot be empty");
    return diag.result({ messages: [] });
  }

  const messages: ChatMessage[] = [];
  const seenRoles = new Set<unknown>();

  raw.forEach((message: unknown, i) => {
    if (!isObject(message)) {
      diag.error(`Message ${i} must be a dictionary`);
      return;
    }
    if (!("role" in message)) {
      diag.error(`Message ${i} missing 'role' field`);
      return;
    }
    if (!("content" in message)) {
      diag.error(`Message ${i} missing 'content' field`);
      return;
    }

    const { role, content } = message;
    if (!isRole(role)) {
      diag.error(`Invalid role '${formatValue(role)}' in message ${i}`);
    }
    seenRoles.add(role);

    if (typeof content !== "string") {
      diag.error(`Content in message ${i} must be a string`);
    } else if (content.trim().length === 0) {
      diag.warn(`Empty content in message ${i}`);
    }

    if (isRole(role) && typeof content === "string") {
      messages.push({ role, content });
    }
  });

  if (!seenRoles.has("user")) diag.warn("No 'user' message found");
  if (!seenRoles.has("assistant")) diag.warn("No 'assistant' message found");

  return diag.result({ messages });
}

export function validateRecord(
  data: unknown,
  lineNumber: number
): ValidationResult {
  const decoded = decodeExample(data, lineNumber);
  return decoded.ok
    ? { valid: true, errors: [], warnings: decoded.warnings }
    : { valid: false, errors: decoded.errors, warnings: decoded.warnings };
}
