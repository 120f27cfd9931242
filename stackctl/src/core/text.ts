/** Last `n` non-empty lines of `text`. */
export function tailLines(text: string, n: number): string {
  if (n <= 0) return "";
  const lines = text.split(/\r?\n/);
  while (lines.length > 0 && lines[lines.length - 1].trim() === "") lines.pop();
  return lines.slice(-n).join("\n");
}

/** stderr and stdout of a command, stderr first, as compose reports progress there. */
export function combineOutput(stdout: string, stderr: string): string {
  return [stderr.trim(), stdout.trim()].filter((s) => s.length > 0).join("\n");
}
