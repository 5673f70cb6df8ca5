import { spawn } from 'child_process';
import * as dotenv from 'dotenv';
import { copyFileSync, existsSync, mkdirSync, readFileSync } from 'fs';
import { createInterface } from 'readline';

export interface RunOptions {
  /** Hand the terminal to the child (prompts, progress bars). */
  interactive?: boolean;
}

export interface RunResult {
  code: number;
  output: string;
}

/**
 * Everything the bootstrap touches outside the process. Tests pass a fake.
 */
export interface SystemOps {
  commandExists(command: string): Promise<boolean>;
  run(command: string, args: string[], options?: RunOptions): Promise<RunResult>;
  exists(path: string): boolean;
  mkdir(path: string): void;
  copyFile(from: string, to: string): void;
  readEnvFile(path: string): Record<string, string>;
  waitForEnter(prompt: string): Promise<void>;
}

export interface Reporter {
  step(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

function runProcess(command: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
  return new Promise(resolve => {
    const child = spawn(command, args, {
      stdio: options.interactive ? 'inherit' : ['ignore', 'pipe', 'pipe'],
    });
    let output = '';
    child.stdout?.on('data', (chunk: Buffer) => {
      output += chunk.toString();
    });
    child.stderr?.on('data', (chunk: Buffer) => {
      output += chunk.toString();
    });
    // A missing binary surfaces as 'error' rather than a non-zero exit.
    child.on('error', error => resolve({ code: 127, output: output + error.message }));
    child.on('close', code => resolve({ code: code ?? 1, output }));
  });
}

export const nodeSystem: SystemOps = {
  async commandExists(command) {
    const probe = process.platform === 'win32' ? 'where' : 'which';
    const result = await runProcess(probe, [command]);
    return result.code === 0;
  },
  run: runProcess,
  exists: path => existsSync(path),
  mkdir: path => {
    mkdirSync(path, { recursive: true });
  },
  copyFile: (from, to) => copyFileSync(from, to),
  readEnvFile: path => dotenv.parse(readFileSync(path)),
  waitForEnter: prompt =>
    new Promise(resolve => {
      const rl = createInterface({ input: process.stdin, output: process.stdout });
      rl.question(prompt, () => {
        rl.close();
        resolve();
      });
    }),
};
