export interface SystemPromptOptions {
  /** SQL dialect name, e.g. PostgreSQL */
  dialect: string;
  /** Default row limit for exploratory queries */
  topK: number;
  /** YYYY-MM-DD */
  today: string;
  /** Table names, when known up front */
  tables?: readonly string[] | undefined;
  /** Whether the get_column_meanings tool is registered */
  columnMeanings?: boolean | undefined;
}

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function buildSystemPrompt(options: SystemPromptOptions): string {
  const rules = [
    'Only answer factual questions after you have the actual data from the database; never guess or make up numbers.',
    'Start with sql_db_list_tables, then use sql_db_schema on the relevant tables before writing a query.',
    options.columnMeanings
      ? 'Use get_column_meanings to learn what the columns of a table represent before interpreting them.'
      : undefined,
    `Write syntactically correct ${options.dialect}. Unless the user asks for a specific number of rows, ` +
      `limit exploratory queries to ${options.topK} rows and order them by a relevant column.`,
    'Select only the columns you need. Use single quotes for string literals.',
    'Never write data: no INSERT, UPDATE, DELETE, DROP or other DML/DDL statements.',
    'If a tool returns an error, read it, fix the arguments or the query, and try again. Do not repeat an identical failing call.',
    'For charts, run the query with sql_db_query first and pass its rows to create_chart.',
    'Use export_query_to_csv when the user wants a download of the data, and create_pdf_report for reports.',
    'When a tool created a file, include its download URL in your answer.',
  ].filter((rule): rule is string => rule !== undefined);

  const lines = [
    `You are a helpful assistant with access to a ${options.dialect} database. ` +
      'Answer questions by querying it with the tools provided.',
    '',
    `Current date: ${options.today}`,
  ];
  if (options.tables && options.tables.length > 0) {
    lines.push(`Tables: ${options.tables.join(', ')}`);
  }
  lines.push('', 'RULES:', ...rules.map((rule, index) => `${index + 1}. ${rule}`));
  return lines.join('\n');
}
