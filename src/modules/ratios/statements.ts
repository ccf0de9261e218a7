import { z } from 'zod';
import { StatementValidationError } from './errors.js';
import { SUPPORTED_LOCALES } from './types.js';

const amountsSchema = z.record(z.string().min(1), z.number().finite());

export const financialStatementSchema = z.object({
  company: z.string().min(1).optional(),
  period: z.string().min(1).optional(),
  locale: z.enum(SUPPORTED_LOCALES).optional(),
  lineItems: amountsSchema,
  metrics: z.array(z.string().min(1)).optional(),
  benchmarks: amountsSchema.optional(),
  peerValues: z.record(z.string().min(1), z.array(z.number().finite())).optional()
});

export type FinancialStatement = z.infer<typeof financialStatementSchema>;

/** Validates a statement payload, e.g. the parsed contents of a JSON file. */
export function parseStatement(raw: unknown): FinancialStatement {
  const parsed = financialStatementSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StatementValidationError(
      parsed.error.issues.map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${where}: ${issue.message}`;
      })
    );
  }
  return parsed.data;
}
