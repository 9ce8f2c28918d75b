import Table from 'cli-table3';

/**
 * Prints rows under a header taken from the first row's keys.
 */
export function printTable(
  data: Record<string, string>[],
  options?: Table.TableConstructorOptions,
) {
  const head = options?.head ?? Object.keys(data[0] ?? {});
  const table = new Table({ ...options, head });
  data.forEach((row) => table.push(Object.values(row)));
  console.log(table.toString());
}
