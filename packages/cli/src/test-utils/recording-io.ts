import type { CliIO } from '../lib/io.js';

export interface RecordingIO extends CliIO {
  readonly stdout: string[];
  readonly stderr: string[];
  readonly questions: string[];
}

/** IO double that records output and answers prompts from `answers` in order. */
export function recordingIO(answers: readonly string[] = []): RecordingIO {
  const pending = [...answers];
  const stdout: string[] = [];
  const stderr: string[] = [];
  const questions: string[] = [];

  return {
    stdout,
    stderr,
    questions,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
    ask: async (question) => {
      questions.push(question);
      return pending.shift() ?? '';
    },
  };
}
