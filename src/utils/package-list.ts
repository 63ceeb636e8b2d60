import path from 'node:path';

/**
 * Combine package paths from the command line and from standard input.
 *
 * Standard input holds whitespace-separated paths (typically the output of
 * `grep -rl`). Every path is made absolute against `cwd`.
 *
 * @throws Error when no path was given at all
 */
export function collectPackagePaths(
  args: readonly string[],
  stdinText: string | null,
  cwd: string = process.cwd(),
): string[] {
  const packages = [...args];
  if (stdinText !== null) {
    packages.push(...stdinText.split(/\s+/).filter((entry) => entry.length > 0));
  }

  if (packages.length === 0) {
    throw new Error(
      'You must specify at least one package. Please list package paths as arguments or through stdin',
    );
  }

  return packages.map((entry) => path.resolve(cwd, entry));
}

/**
 * Read all of a stream as UTF-8 text.
 */
export async function readStream(stream: AsyncIterable<string | Buffer>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}
