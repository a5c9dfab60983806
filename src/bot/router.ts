import { botLog } from "../logger";
import { isStep, parseStep, splitStep, type Step, type StepName, type StepOf } from "./steps";

type Entry<Ctx> = (ctx: Ctx, step: Step) => Promise<void>;

/**
 * Two-pass lookup shared by the step routers and the callback router: the whole
 * key first, then the part before the first colon.
 */
export function lookupByKey<V>(entries: ReadonlyMap<string, V>, raw: string): V | undefined {
  const exact = entries.get(raw);
  if (exact !== undefined) return exact;
  const [prefix] = splitStep(raw);
  return entries.get(prefix);
}

export class StepRouter<Ctx> {
  private readonly entries = new Map<string, Entry<Ctx>>();

  constructor(readonly name: string) {}

  on<N extends StepName>(name: N, handler: (ctx: Ctx, step: StepOf<N>) => Promise<void>): this {
    this.entries.set(name, async (ctx, step) => {
      if (isStep(step, name)) {
        await handler(ctx, step);
      }
    });
    return this;
  }

  /** Returns false when no entry matches the step (or its argument is malformed). */
  async route(ctx: Ctx, rawStep: string): Promise<boolean> {
    const entry = lookupByKey(this.entries, rawStep);
    if (!entry) return false;

    const step = parseStep(rawStep);
    if (!step) {
      botLog.warn({ router: this.name, rawStep }, "Stored step has a malformed argument");
      return false;
    }

    await entry(ctx, step);
    return true;
  }
}
