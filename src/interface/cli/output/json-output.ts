/**
 * JSON output mode for --json flag. Everything goes to stdout as one document.
 */

export function printJson(data: unknown): void {
  process.stdout.write(JSON.stringify(data, null, 2) + '\n');
}

export interface JsonError {
  code?: string;
  message: string;
  cause?: string;
  hint?: string;
}

export function printJsonError(error: JsonError): void {
  printJson({ error });
}
