/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";
import { DEFAULT_HISTORY_LIMIT } from "@coinpurse/ledger";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Major units as a JSON number or decimal string. */
export const AmountSchema = z.union([
  z.number().finite(),
  z.string().trim().regex(/^\d+([.,]\d+)?$/, "Amount must be a decimal number").transform((v) => v.replace(",", ".")),
]);

export const CurrencySchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z]{3}$/, "Currency must be a three-letter code")
  .transform((v) => v.toUpperCase());

export const NoteSchema = z.string().max(500).nullish();

export const FlowKindSchema = z.enum(["EXPENSE", "INCOME"]);

export const FormatQuerySchema = z.enum(["json", "text"]).default("json");

/** "true" / "1" → true, anything else false. */
const BooleanQuerySchema = z
  .string()
  .optional()
  .transform((v) => v === "true" || v === "1");

// =============================================================================
// Account DTOs
// =============================================================================

export const UpdatePreferencesSchema = z
  .object({
    defaultCurrency: CurrencySchema.optional(),
    preferredReportCurrency: CurrencySchema.optional(),
  })
  .refine(
    (v) => v.defaultCurrency !== undefined || v.preferredReportCurrency !== undefined,
    "Provide defaultCurrency or preferredReportCurrency",
  );

export type UpdatePreferencesDto = z.infer<typeof UpdatePreferencesSchema>;

// =============================================================================
// Category DTOs
// =============================================================================

export const ListCategoriesQuerySchema = z.object({
  flowKind: FlowKindSchema.optional(),
  includeArchived: BooleanQuerySchema,
});

export const CreateCategorySchema = z.object({
  name: z.string().min(1).max(64),
  icon: z.string().min(1).max(16),
  flowKind: FlowKindSchema,
});

export type CreateCategoryDto = z.infer<typeof CreateCategorySchema>;

export const CategoryParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const UpdateCategorySchema = z
  .object({
    name: z.string().min(1).max(64).optional(),
    icon: z.string().min(1).max(16).optional(),
  })
  .refine((v) => v.name !== undefined || v.icon !== undefined, "Provide name or icon");

export type UpdateCategoryDto = z.infer<typeof UpdateCategorySchema>;

// =============================================================================
// Transaction DTOs
// =============================================================================

export const CreateTransactionSchema = z.object({
  kind: FlowKindSchema,
  amount: AmountSchema,
  currency: CurrencySchema,
  categoryId: z.number().int().positive().nullish(),
  note: NoteSchema,
  atTime: z.string().datetime({ offset: true }).optional(),
});

export type CreateTransactionDto = z.infer<typeof CreateTransactionSchema>;

export const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(DEFAULT_HISTORY_LIMIT),
  format: FormatQuerySchema,
});

// =============================================================================
// Report DTOs
// =============================================================================

export const MonthlyReportQuerySchema = z.object({
  year: z.coerce.number().int().min(1970).max(9999),
  month: z.coerce.number().int().min(1).max(12),
  currency: CurrencySchema.optional(),
  format: FormatQuerySchema,
});

export const RangeReportQuerySchema = z.object({
  /** YYYY-MM-DD, or DD.MM[.YYYY] */
  start: z.string().min(1),
  end: z.string().min(1),
  currency: CurrencySchema.optional(),
  format: FormatQuerySchema,
});

// =============================================================================
// Debt DTOs
// =============================================================================

export const CreateDebtSchema = z.object({
  counterparty: z.string().trim().min(1).max(64),
  /** Which side the caller is on */
  direction: z.enum(["owed_to_me", "i_owe"]),
  amount: AmountSchema,
  currency: CurrencySchema,
  categoryId: z.number().int().positive().nullish(),
  note: NoteSchema,
});

export type CreateDebtDto = z.infer<typeof CreateDebtSchema>;

export const ListDebtsQuerySchema = z.object({
  all: BooleanQuerySchema,
});

export const DebtSummaryQuerySchema = z.object({
  currency: CurrencySchema.optional(),
  format: FormatQuerySchema,
});

export const NetQuerySchema = z.object({
  base: CurrencySchema.default("EUR"),
  format: FormatQuerySchema,
});

export const CancelMutualDebtsSchema = z.object({
  base: CurrencySchema.default("EUR"),
});

// =============================================================================
// Split DTOs
// =============================================================================

export const SplitBillSchema = z.object({
  counterparty: z.string().trim().min(1).max(64),
  total: AmountSchema,
  otherShare: z.union([z.literal("half"), AmountSchema]).default("half"),
  currency: CurrencySchema,
  categoryId: z.number().int().positive().nullish(),
  note: NoteSchema,
  atTime: z.string().datetime({ offset: true }).optional(),
});

export type SplitBillDto = z.infer<typeof SplitBillSchema>;

// =============================================================================
// Flow DTOs
// =============================================================================

export const StartFlowSchema = z.object({
  kind: z.enum(["expense", "income", "split"]),
});

export const FlowInputSchema = z.object({
  text: z.string().max(500),
});
