/**
 * FASTQ parsing primitives
 *
 * Small pure helpers shared by the parser and the writer.
 */

/**
 * Header lines start with '@' followed by an identifier
 */
export function isValidHeader(line: string): boolean {
  return line.length > 1 && line.startsWith("@") && !/^@\s/.test(line);
}

/**
 * Separator lines start with '+', optionally repeating the identifier
 */
export function isValidSeparator(line: string): boolean {
  return line.startsWith("+");
}

/**
 * Identifier: header text after '@' up to the first whitespace
 */
export function extractId(header: string): string {
  return header.slice(1).split(/\s/, 1)[0] ?? "";
}

/**
 * Description: header text after the identifier, if any
 */
export function extractDescription(header: string): string | undefined {
  const match = /^@\S+\s+(.*)$/.exec(header);
  const description = match?.[1]?.trim();
  return description === undefined || description === "" ? undefined : description;
}

/**
 * Build the header line back from a record
 */
export function formatHeader(id: string, description?: string): string {
  return description === undefined ? `@${id}` : `@${id} ${description}`;
}
