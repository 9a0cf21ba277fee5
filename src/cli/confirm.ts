import readline from "readline";

export interface PromptStreams {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export function isAffirmative(answer: string): boolean {
  return answer.trim().toLowerCase() === "y";
}

export function askYesNo(question: string, streams: PromptStreams = {}): Promise<boolean> {
  const rl = readline.createInterface({
    input: streams.input ?? process.stdin,
    output: streams.output ?? process.stdout
  });
  return new Promise((resolve) => {
    let answered = false;
    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(isAffirmative(answer));
    });
    rl.once("close", () => {
      if (!answered) resolve(false);
    });
  });
}
