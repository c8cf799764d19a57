import { z } from 'zod';
import { AssetCategory, EquityCategory, LiabilityCategory, TimeGranularity } from './enums';
import { ValidationError } from './errors';

/**
 * Boundary schemas for the records the dashboard (or an import layer) hands to the engine.
 * Parsing only checks shape and ranges; ledger rules live in `engine/invariants`.
 */
const AmountSchema = z.number().finite();

export const BalanceSheetInputSchema = z.object({
  assets: z.record(z.nativeEnum(AssetCategory), AmountSchema),
  liabilities: z.record(z.nativeEnum(LiabilityCategory), AmountSchema),
  equity: z.record(z.nativeEnum(EquityCategory), AmountSchema),
});
export type BalanceSheetInput = z.input<typeof BalanceSheetInputSchema>;

const PercentSchema = z.number().min(0).max(100);

export const StressScenarioInputSchema = z.object({
  name: z.string().trim().min(1),
  timeGranularity: z.nativeEnum(TimeGranularity),
  numPeriods: z.number().int().positive(),
  runoffRates: z.record(z.nativeEnum(LiabilityCategory), PercentSchema).optional(),
  customRunoff: z.array(z.record(z.nativeEnum(LiabilityCategory), AmountSchema.nonnegative())).optional(),
  securityShocks: z.record(z.nativeEnum(AssetCategory), z.number().min(-100).max(100)).optional(),
  fireSaleDiscount: PercentSchema.default(10),
  fireSaleIncrement: PercentSchema.default(2),
  fundingSpreadIncreaseBps: AmountSchema.nonnegative().default(100),
  collateralHaircutIncrease: PercentSchema.default(10),
  loanMigrationRate: PercentSchema.default(2),
  provisioningRate: PercentSchema.default(50),
  rwaIncrease: PercentSchema.default(10),
  description: z.string().optional(),
  createdAt: z.string().optional(),
});
export type StressScenarioInput = z.input<typeof StressScenarioInputSchema>;

const formatIssue = (issue: z.ZodIssue): string =>
  issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;

export const parseOrThrow = <S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map(formatIssue));
  }
  return parsed.data;
};
