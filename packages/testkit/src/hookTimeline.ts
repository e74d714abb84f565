import type { AppHooks, HookContext, UpdateContext } from "@termloop/core";

export type HookName = "onEnter" | "onUpdate" | "onExit";

export type HookSpan = Readonly<{
  hook: HookName;
  start: number;
  end: number;
}>;

export type HookTimeline = Readonly<{
  hooks: AppHooks;
  spans: () => readonly HookSpan[];
  count: (hook: HookName) => number;
  /** UpdateContext.key values seen by onUpdate, in order. */
  keys: () => readonly (number | null)[];
}>;

/**
 * Wrap `inner` so that every hook call records its entry and exit time.
 */
export function createHookTimeline(
  inner: AppHooks = {},
  now: () => number = () => performance.now(),
): HookTimeline {
  const spans: HookSpan[] = [];
  const keys: (number | null)[] = [];

  function timed<C>(hook: HookName, fn: ((ctx: C) => void) | undefined): (ctx: C) => void {
    return (ctx) => {
      const start = now();
      try {
        fn?.(ctx);
      } finally {
        spans.push({ hook, start, end: now() });
      }
    };
  }

  const onUpdate = timed<UpdateContext>("onUpdate", inner.onUpdate);

  return {
    hooks: {
      onEnter: timed<HookContext>("onEnter", inner.onEnter),
      onUpdate: (ctx) => {
        keys.push(ctx.key);
        onUpdate(ctx);
      },
      onExit: timed<HookContext>("onExit", inner.onExit),
    },
    spans: () => spans,
    count: (hook) => spans.filter((s) => s.hook === hook).length,
    keys: () => keys,
  };
}

export function spansOverlap(a: HookSpan, b: HookSpan): boolean {
  return a.start < b.end && b.start < a.end;
}
