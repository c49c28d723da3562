/**
 * Terminal prompts
 */

import * as readline from 'node:readline';
import { Writable } from 'node:stream';

export interface PromptStreams {
  input: NodeJS.ReadableStream & { isTTY?: boolean };
  output: NodeJS.WritableStream;
}

const defaultStreams = (): PromptStreams => ({ input: process.stdin, output: process.stderr });

/**
 * Ask a question without echoing the answer. Input that is not a terminal is
 * read as a plain line.
 */
export async function promptHidden(question: string, streams: PromptStreams = defaultStreams()): Promise<string> {
  let muted = false;
  const output = new Writable({
    write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
      if (!muted) {
        streams.output.write(chunk);
      }
      callback();
    },
  });

  const rl = readline.createInterface({
    input: streams.input,
    output,
    terminal: streams.input.isTTY === true,
  });

  return new Promise<string>((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      if (muted) {
        streams.output.write('\n');
      }
      resolve(answer);
    });
    muted = streams.input.isTTY === true;
  });
}

/**
 * Read all of stdin as bytes
 */
export async function readStdin(input: NodeJS.ReadableStream = process.stdin): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of input) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  return Buffer.concat(chunks);
}
