import type { AlertCondition } from "../types.js";

export interface ConditionContext {
  ticker: string;
  displayName: string;
  price: number;
  /** Last price recorded by the previous run. */
  lastPrice?: number;
  /** History price one period back, for change conditions. */
  referencePrice?: number;
  triggered: boolean;
}

export interface ConditionOutcome {
  fires: boolean;
  triggered: boolean;
  message?: string;
}

type Condition<K extends AlertCondition["kind"]> = Extract<AlertCondition, { kind: K }>;

export function evaluateCondition(condition: AlertCondition, ctx: ConditionContext): ConditionOutcome {
  switch (condition.kind) {
    case "above":
      return evaluateAbove(condition, ctx);
    case "below":
      return evaluateBelow(condition, ctx);
    case "percent_change":
      return evaluatePercentChange(condition, ctx);
    case "absolute_change":
      return evaluateAbsoluteChange(condition, ctx);
    default: {
      const unreachable: never = condition;
      throw new Error(`Unknown condition kind: ${JSON.stringify(unreachable)}`);
    }
  }
}

function evaluateAbove(condition: Condition<"above">, ctx: ConditionContext): ConditionOutcome {
  const { threshold } = condition;

  if (ctx.price >= threshold) {
    if (ctx.triggered) return { fires: false, triggered: true };
    return { fires: true, triggered: true, message: formatThresholdMessage(condition, ctx, "above") };
  }

  // Only reset once the previous run also saw the price at or past the threshold.
  if (ctx.triggered && ctx.lastPrice !== undefined && ctx.lastPrice >= threshold) {
    return { fires: false, triggered: false };
  }
  return { fires: false, triggered: ctx.triggered };
}

function evaluateBelow(condition: Condition<"below">, ctx: ConditionContext): ConditionOutcome {
  const { threshold } = condition;

  if (ctx.price <= threshold) {
    if (ctx.triggered) return { fires: false, triggered: true };
    return { fires: true, triggered: true, message: formatThresholdMessage(condition, ctx, "below") };
  }

  if (ctx.triggered && ctx.lastPrice !== undefined && ctx.lastPrice <= threshold) {
    return { fires: false, triggered: false };
  }
  return { fires: false, triggered: ctx.triggered };
}

function evaluatePercentChange(condition: Condition<"percent_change">, ctx: ConditionContext): ConditionOutcome {
  if (ctx.referencePrice === undefined) return { fires: false, triggered: ctx.triggered };

  const change = ((ctx.price - ctx.referencePrice) / ctx.referencePrice) * 100;
  return evaluateChange(condition, ctx, change, () =>
    `${ctx.displayName} moved ${Math.abs(change).toFixed(1)}% ${direction(change)} in ${condition.period.label} (currently $${ctx.price.toFixed(2)})`,
  );
}

function evaluateAbsoluteChange(condition: Condition<"absolute_change">, ctx: ConditionContext): ConditionOutcome {
  if (ctx.referencePrice === undefined) return { fires: false, triggered: ctx.triggered };

  const change = ctx.price - ctx.referencePrice;
  return evaluateChange(condition, ctx, change, () =>
    `${ctx.displayName} moved $${Math.abs(change).toFixed(2)} ${direction(change)} in ${condition.period.label} (currently $${ctx.price.toFixed(2)})`,
  );
}

function evaluateChange(
  condition: AlertCondition,
  ctx: ConditionContext,
  change: number,
  describe: () => string,
): ConditionOutcome {
  if (Math.abs(change) >= condition.threshold) {
    if (ctx.triggered) return { fires: false, triggered: true };
    return { fires: true, triggered: true, message: condition.message || describe() };
  }
  return { fires: false, triggered: false };
}

function formatThresholdMessage(condition: AlertCondition, ctx: ConditionContext, side: "above" | "below"): string {
  if (condition.message) return condition.message;
  return `${ctx.displayName} is ${side} $${condition.threshold.toFixed(2)} (currently $${ctx.price.toFixed(2)})`;
}

function direction(change: number): "up" | "down" {
  return change < 0 ? "down" : "up";
}
