import fs from 'node:fs/promises';
import { parse, printParseErrorCode, type ParseError } from 'jsonc-parser';

export function parseJsoncText(content: string, filePath: string): unknown {
  const errors: ParseError[] = [];
  const parsed: unknown = parse(content, errors, { allowTrailingComma: true });

  if (errors.length > 0) {
    const lines = errors.map((item) => `${printParseErrorCode(item.error)}@${item.offset}`).join(', ');
    throw new Error(`Cannot parse JSONC file ${filePath}: ${lines}`);
  }

  return parsed;
}

export async function readJsoncFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(`File not found: ${filePath}`);
    }
    throw error;
  }

  if (!content.trim()) {
    throw new Error(`File is empty: ${filePath}`);
  }
  return parseJsoncText(content, filePath);
}
