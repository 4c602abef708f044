import fs from 'node:fs';

/**
 * Write JSON output to stdout.
 */
export function writeOutput(data: unknown): void {
  process.stdout.write(JSON.stringify(data, null, 2) + '\n');
}

/**
 * Write an error response to stdout as JSON.
 */
export function writeError(message: string): void {
  writeOutput({ error: message });
}

/**
 * Write generated text, newline-terminated, to a file or to stdout.
 */
export function writeText(text: string, filePath?: string): void {
  const content = text.endsWith('\n') ? text : text + '\n';
  if (filePath) {
    fs.writeFileSync(filePath, content, 'utf-8');
  } else {
    process.stdout.write(content);
  }
}
