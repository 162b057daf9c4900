import { createReadStream, promises as fs } from 'fs';
import { createInterface } from 'readline';

/**
 * Stream a log file line by line. Undecodable bytes become U+FFFD rather than
 * failing the read. A missing or non-regular file rejects before any line is yielded.
 */
export async function* readLogLines(filePath: string): AsyncGenerator<string> {
  const stat = await fs.stat(filePath);
  if (!stat.isFile()) {
    throw new Error(`Not a regular file: ${filePath}`);
  }
  const input = createReadStream(filePath, { encoding: 'utf8' });
  const rl = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of rl) {
      yield line;
    }
  } finally {
    rl.close();
    input.destroy();
  }
}
