import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError, describeError } from '../errors.js';

/**
 * Plain-language meanings of column names, per table:
 * `{ "orders": { "amt_1": "Order total in cents" } }`
 */
export const ColumnGlossarySchema = z.record(z.record(z.string()));

export type ColumnGlossary = z.infer<typeof ColumnGlossarySchema>;

export async function loadColumnGlossary(filePath: string): Promise<ColumnGlossary> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read column glossary '${filePath}': ${describeError(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Column glossary '${filePath}' is not valid JSON: ${describeError(error)}`);
  }

  const parsed = ColumnGlossarySchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(`Column glossary '${filePath}' must map table names to column meanings`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

/**
 * Case-insensitive lookup; SQL identifiers are usually folded to lower case.
 */
export function lookupTable(glossary: ColumnGlossary, table: string): Record<string, string> | undefined {
  const exact = glossary[table];
  if (exact) {
    return exact;
  }
  const wanted = table.toLowerCase();
  for (const [name, columns] of Object.entries(glossary)) {
    if (name.toLowerCase() === wanted) {
      return columns;
    }
  }
  return undefined;
}
