/**
 * Type barrel — re-exports all public types from @coinpurse/node.
 */

// DTOs
export {
  AmountSchema,
  CurrencySchema,
  NoteSchema,
  FlowKindSchema,
  FormatQuerySchema,
  UpdatePreferencesSchema,
  ListCategoriesQuerySchema,
  CreateCategorySchema,
  CategoryParamsSchema,
  UpdateCategorySchema,
  CreateTransactionSchema,
  HistoryQuerySchema,
  MonthlyReportQuerySchema,
  RangeReportQuerySchema,
  CreateDebtSchema,
  ListDebtsQuerySchema,
  DebtSummaryQuerySchema,
  NetQuerySchema,
  CancelMutualDebtsSchema,
  SplitBillSchema,
  StartFlowSchema,
  FlowInputSchema,
} from "./dto.js";
export type {
  UpdatePreferencesDto,
  CreateCategoryDto,
  UpdateCategoryDto,
  CreateTransactionDto,
  CreateDebtDto,
  SplitBillDto,
} from "./dto.js";

// Error
export { createErrorEnvelope, publicErrorCode } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
