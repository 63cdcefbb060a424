import readline from "node:readline";
import { Writable } from "node:stream";

export interface PromptStreams {
  input: NodeJS.ReadableStream & { isTTY?: boolean };
  output: NodeJS.WritableStream;
}

/**
 * Read a password without echoing it. The prompt goes to stderr so stdout
 * only carries the graph. Rejects when input ends or is interrupted before
 * an answer arrives.
 */
export function promptPassword(
  prompt = "Password: ",
  streams: PromptStreams = { input: process.stdin, output: process.stderr }
): Promise<string> {
  let muted = false;
  const output = new Writable({
    write(chunk, encoding, callback) {
      if (!muted) streams.output.write(chunk, encoding);
      callback();
    },
  });
  const rl = readline.createInterface({
    input: streams.input,
    output,
    terminal: streams.input.isTTY === true,
  });

  return new Promise((resolve, reject) => {
    let answered = false;
    rl.on("close", () => {
      if (!answered) reject(new Error("No password entered"));
    });
    rl.on("SIGINT", () => {
      rl.close();
    });
    rl.question(prompt, (answer) => {
      answered = true;
      rl.close();
      streams.output.write("\n");
      resolve(answer);
    });
    muted = true;
  });
}
