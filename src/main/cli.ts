/**
 * Command-line launcher. Ctrl+C stops new files from starting; a second
 * Ctrl+C exits immediately.
 */

import { runCli } from './index';

const controller = new AbortController();

process.on('SIGINT', () => {
  if (controller.signal.aborted) {
    process.exit(130);
  }
  process.stderr.write('\n[!] Stopping after in-flight files finish (Ctrl+C again to quit)\n');
  controller.abort();
});

runCli(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr }, { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`[!] ${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
    process.exitCode = 1;
  });
