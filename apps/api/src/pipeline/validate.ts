import { Logger, consoleLogger } from '../logger';
import { RawTable } from '../types/review';

export type StructureCheck = {
  ok: boolean;
  missing: string[];
};

export const checkStructure = (table: Pick<RawTable, 'columns'>, requiredFields: string[]): StructureCheck => {
  const present = new Set(table.columns);
  const missing = requiredFields.filter(field => !present.has(field));
  return { ok: missing.length === 0, missing };
};

/** Schema gate: every required field must exist as a column. Rows are not inspected. */
export const validateStructure = (
  table: Pick<RawTable, 'columns'>,
  requiredFields: string[],
  logger: Logger = consoleLogger
): StructureCheck => {
  const check = checkStructure(table, requiredFields);
  if (check.ok) logger.info('All required columns present');
  else logger.error(`Missing required columns: ${check.missing.join(', ')}`);
  return check;
};
