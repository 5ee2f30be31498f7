import { Readable, Writable } from 'stream';
import { CliIO } from '../../src/cli/cli.service';

export interface CapturedIO extends CliIO {
  stdout: () => string;
  stderr: () => string;
}

function capture(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

export function captureIO(inputText = ''): CapturedIO {
  const out = capture();
  const err = capture();
  return {
    input: Readable.from([inputText]),
    output: out.stream,
    error: err.stream,
    stdout: out.text,
    stderr: err.text,
  };
}
