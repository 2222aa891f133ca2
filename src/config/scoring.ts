import { z } from 'zod';
import type { AppConfig } from './env';

export const PriorityWeightsSchema = z.object({
  daysSinceReturn: z.number().finite().nonnegative(),
  countingDelay: z.number().finite().nonnegative(),
  validationDelay: z.number().finite().nonnegative(),
  openTablets: z.number().finite().nonnegative(),
});

export const PriorityLevelSchema = z.object({
  label: z.string().min(1),
  min: z.number().finite(),
});

export const UrgencyRuleSchema = z.object({
  category: z.string().min(1),
  minScore: z.number().finite(),
  minDays: z.number().finite(),
});

export const ScoringConfigSchema = z.object({
  weights: PriorityWeightsSchema,
  // Half-open bands: level i covers [levels[i].min, levels[i + 1].min)
  levels: z
    .array(PriorityLevelSchema)
    .min(1)
    .superRefine((levels, ctx) => {
      for (let i = 1; i < levels.length; i++) {
        if (levels[i].min <= levels[i - 1].min) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [i, 'min'],
            message: `level "${levels[i].label}" must start above ${levels[i - 1].min}`,
          });
        }
      }
    }),
  // Evaluated in order, first hit wins
  urgencyRules: z.array(UrgencyRuleSchema),
  defaultUrgency: z.string().min(1),
});

export type PriorityWeights = z.infer<typeof PriorityWeightsSchema>;
export type PriorityLevel = z.infer<typeof PriorityLevelSchema>;
export type UrgencyRule = z.infer<typeof UrgencyRuleSchema>;
export type ScoringConfig = z.infer<typeof ScoringConfigSchema>;

export type ScoringConfigInput = {
  weights?: Partial<PriorityWeights>;
  levels?: PriorityLevel[];
  urgencyRules?: UrgencyRule[];
  defaultUrgency?: string;
};

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  weights: {
    daysSinceReturn: 0.4,
    countingDelay: 0.3,
    validationDelay: 0.2,
    openTablets: 0.1,
  },
  levels: [
    { label: 'LOW', min: 0 },
    { label: 'MEDIUM', min: 10 },
    { label: 'HIGH', min: 20 },
    { label: 'CRITICAL', min: 35 },
  ],
  urgencyRules: [
    { category: 'URGENT', minScore: 35, minDays: 30 },
    { category: 'ATTENTION', minScore: 20, minDays: 15 },
    { category: 'NORMAL', minScore: 10, minDays: 7 },
  ],
  defaultUrgency: 'NONE',
};

export class InvalidScoringConfigError extends Error {
  issues: string[];
  constructor(issues: string[]) {
    super(`Invalid scoring config: ${issues.join('; ')}`);
    this.name = 'InvalidScoringConfigError';
    this.issues = issues;
  }
}

export function resolveScoringConfig(input: ScoringConfigInput = {}): ScoringConfig {
  const parsed = ScoringConfigSchema.safeParse({
    weights: { ...DEFAULT_SCORING_CONFIG.weights, ...input.weights },
    levels: input.levels ?? DEFAULT_SCORING_CONFIG.levels,
    urgencyRules: input.urgencyRules ?? DEFAULT_SCORING_CONFIG.urgencyRules,
    defaultUrgency: input.defaultUrgency ?? DEFAULT_SCORING_CONFIG.defaultUrgency,
  });
  if (!parsed.success) {
    throw new InvalidScoringConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * "LOW:0,MEDIUM:10,HIGH:20" -> [{ label: 'LOW', min: 0 }, ...]
 */
export function parsePriorityLevels(raw: string): PriorityLevel[] {
  const entries = raw
    .split(',')
    .map((x) => x.trim())
    .filter(Boolean);

  const bad: string[] = [];
  const levels: PriorityLevel[] = [];
  for (const entry of entries) {
    const m = entry.match(/^([^:]+):\s*(-?\d+(?:\.\d+)?)$/);
    if (!m) {
      bad.push(`PRIORITY_LEVELS: malformed entry "${entry}"`);
      continue;
    }
    levels.push({ label: m[1].trim(), min: Number(m[2]) });
  }
  if (bad.length > 0) throw new InvalidScoringConfigError(bad);
  return levels;
}

export function scoringConfigFromEnv(
  env: Pick<
    AppConfig,
    | 'PRIORITY_WEIGHT_DAYS_SINCE_RETURN'
    | 'PRIORITY_WEIGHT_COUNTING_DELAY'
    | 'PRIORITY_WEIGHT_VALIDATION_DELAY'
    | 'PRIORITY_WEIGHT_OPEN_TABLETS'
    | 'PRIORITY_LEVELS'
  >
): ScoringConfig {
  return resolveScoringConfig({
    weights: {
      daysSinceReturn: env.PRIORITY_WEIGHT_DAYS_SINCE_RETURN,
      countingDelay: env.PRIORITY_WEIGHT_COUNTING_DELAY,
      validationDelay: env.PRIORITY_WEIGHT_VALIDATION_DELAY,
      openTablets: env.PRIORITY_WEIGHT_OPEN_TABLETS,
    },
    levels: parsePriorityLevels(env.PRIORITY_LEVELS),
  });
}
