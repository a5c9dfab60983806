import { isContentType, type ContentType } from "../db/contentRepo";

/**
 * Conversation state of one user. Persisted as a string ("get_episode:42") and
 * turned back into this union when an update is routed.
 */
export type Step =
  | { name: "home" }
  | { name: "admin_home" }
  | { name: "admin_upload" }
  | { name: "admin_user_info" }
  | { name: "get_title"; contentType: ContentType }
  | { name: "get_episode"; sessionId: number };

export type StepName = Step["name"];

export type StepOf<N extends StepName> = Extract<Step, { name: N }>;

const PLAIN_STEPS: ReadonlySet<string> = new Set<StepName>(["home", "admin_home", "admin_upload", "admin_user_info"]);

/** Splits on the first colon only; the suffix is null when there is no colon. */
export function splitStep(raw: string): [string, string | null] {
  const idx = raw.indexOf(":");
  if (idx === -1) return [raw, null];
  return [raw.slice(0, idx), raw.slice(idx + 1)];
}

export function serializeStep(step: Step): string {
  switch (step.name) {
    case "get_title":
      return `${step.name}:${step.contentType}`;
    case "get_episode":
      return `${step.name}:${step.sessionId}`;
    default:
      return step.name;
  }
}

export function isStep<N extends StepName>(step: Step, name: N): step is StepOf<N> {
  return step.name === name;
}

function isPlainStep(name: string): name is "home" | "admin_home" | "admin_upload" | "admin_user_info" {
  return PLAIN_STEPS.has(name);
}

/**
 * Parses a stored step. Plain steps ignore any suffix ("home:info" is home);
 * compound steps must carry a valid argument or the result is null.
 */
export function parseStep(raw: string): Step | null {
  const [name, arg] = splitStep(raw);

  if (isPlainStep(name)) {
    return { name };
  }
  if (name === "get_title") {
    return arg !== null && isContentType(arg) ? { name, contentType: arg } : null;
  }
  if (name === "get_episode") {
    if (arg === null || !/^\d+$/.test(arg)) return null;
    const sessionId = Number(arg);
    return Number.isSafeInteger(sessionId) ? { name, sessionId } : null;
  }
  return null;
}
