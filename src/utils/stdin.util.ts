/**
 * Read everything piped to stdin
 * @returns The decoded text, untrimmed
 */
export async function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  stream.setEncoding('utf8');
  let data = '';
  for await (const chunk of stream) {
    data += chunk;
  }
  return data;
}

/** Drop the line terminators an interactive `echo` leaves behind */
export function stripLineEnding(text: string): string {
  return text.replace(/[\r\n]+$/, '');
}
