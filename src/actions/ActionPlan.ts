/**
 * Action plans produced by agents and manual callers.
 * The emulation driver consumes each plan exactly once.
 */

import { z } from 'zod';
import { BUTTON_ACTIONS, type ButtonAction } from '../emulator/Buttons.js';

/** Frames advanced between two actions when a plan does not say otherwise */
export const DEFAULT_DELAY_FRAMES = 10;
export const MAX_PLAN_LENGTH = 32;
export const MAX_DELAY_FRAMES = 600;

export interface ActionPlan {
  actions: readonly ButtonAction[];
  delayFrames: number;
  commentary: string;
}

export interface PlanResult {
  completed: number;
  total: number;
  aborted: boolean;
}

export const ActionPlanSchema = z.object({
  actions: z.array(z.enum(BUTTON_ACTIONS)).min(1).max(MAX_PLAN_LENGTH),
  delayFrames: z.number().int().min(0).max(MAX_DELAY_FRAMES).default(DEFAULT_DELAY_FRAMES),
  commentary: z.string().trim().min(1),
});

export type PlanValidation =
  | { ok: true; plan: ActionPlan }
  | { ok: false; issues: string[] };

/** Enforces the plan contract for any backend: known tokens, bounded length, non-empty commentary. */
export function validatePlan(value: unknown): PlanValidation {
  const parsed = ActionPlanSchema.safeParse(value);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((i) => `${i.path.join('.') || 'plan'}: ${i.message}`),
    };
  }
  return { ok: true, plan: parsed.data };
}
