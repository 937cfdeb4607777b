/** Where command output goes. Stdout carries results, stderr diagnostics. */
export interface Output {
  write(text: string): void
  writeError(text: string): void
}

export const processOutput: Output = {
  write: (text) => {
    process.stdout.write(text)
  },
  writeError: (text) => {
    process.stderr.write(text)
  },
}

export function printLine(out: Output, line = ''): void {
  out.write(`${line}\n`)
}
