import Table from 'cli-table3';

export function printTable(
  head: string[],
  rows: Array<Array<string | number>>,
  options?: Table.TableConstructorOptions,
) {
  const table = new Table({ head, style: { head: [] }, ...options });
  rows.forEach((row) => table.push(row.map((v) => String(v))));
  console.log(table.toString());
}
