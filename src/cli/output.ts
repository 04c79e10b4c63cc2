export function formatLine(parts: readonly string[]): string {
  return parts.filter(part => part.length > 0).join(" ");
}

export function printLine(...parts: string[]): void {
  process.stdout.write(`${formatLine(parts)}\n`);
}

export function printErrorLine(...parts: string[]): void {
  process.stderr.write(`${formatLine(parts)}\n`);
}

export function printLines(lines: readonly string[]): void {
  for (const line of lines) {
    printLine(line);
  }
}
