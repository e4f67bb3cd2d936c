import execa from 'execa';
import { logger } from './logger';

export interface ExecResult {
  stdout: string;
  stderr: string;
  code: number;
  durationMs: number;
}

export async function run(
  command: string,
  args: string[] = [],
  options: { cwd?: string; timeout?: number } = {}
): Promise<ExecResult> {
  const startTime = Date.now();

  logger.debug({ command, args, cwd: options.cwd, timeout: options.timeout }, 'Executing command');

  const execaOptions: execa.Options = {
    reject: false,
    ...(options.cwd ? { cwd: options.cwd } : {}),
    ...(options.timeout ? { timeout: options.timeout } : {}),
  };

  const result = await execa(command, args, execaOptions);
  const durationMs = Date.now() - startTime;
  const code = typeof result.exitCode === 'number' ? result.exitCode : 1;

  if (result.failed) {
    logger.debug({
      command,
      args,
      durationMs,
      code,
      stderrPreview: result.stderr.slice(0, 1000),
    }, 'Command failed');
  } else {
    logger.debug({ command, args, durationMs, code }, 'Command executed successfully');
  }

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    code,
    durationMs,
  };
}
