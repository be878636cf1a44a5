import { execFile, execSync } from 'child_process';
import { existsSync } from 'fs';

/** Runs a command and resolves with its stdout. Killed when `signal` aborts or `timeoutMs` passes. */
export type CommandRunner = (command: string, args: string[], signal: AbortSignal, timeoutMs?: number) => Promise<string>;

/** Capability probe used at registration time. */
export type CommandProbe = (bin: string) => boolean;

export const runCommand: CommandRunner = (command, args, signal, timeoutMs = 0) =>
  new Promise((resolve, reject) => {
    execFile(command, args, { signal, timeout: timeoutMs, encoding: 'utf8', maxBuffer: 4 * 1024 * 1024 }, (err, stdout) => {
      if (err) reject(err);
      else resolve(stdout);
    });
  });

export const commandExists: CommandProbe = (bin) => {
  if (bin.startsWith('/')) return existsSync(bin);
  if (!/^[\w.-]+$/.test(bin)) return false;
  try {
    execSync(`which ${bin} 2>/dev/null`, { stdio: 'pipe', timeout: 1000 });
    return true;
  } catch {
    return false;
  }
};
