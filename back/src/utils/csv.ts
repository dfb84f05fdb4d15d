export type CsvCell = string | number | boolean | null | undefined

export const csvEscape = (value: CsvCell): string => {
  const str = String(value ?? '')
  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`
  }
  return str
}

export const toCsv = (headers: readonly string[], rows: ReadonlyArray<readonly CsvCell[]>): string => {
  const lines = [headers.map(csvEscape).join(','), ...rows.map((row) => row.map(csvEscape).join(','))]
  return `${lines.join('\r\n')}\r\n`
}
