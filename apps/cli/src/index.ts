import { run } from './run.js';

const controller = new AbortController();
process.once('SIGINT', () => controller.abort());

const exitCode = await run(
  process.argv.slice(2),
  {
    stdout: (message) => process.stdout.write(message),
    stderr: (message) => process.stderr.write(message),
    now: () => Date.now(),
  },
  { signal: controller.signal },
);

process.exitCode = exitCode;
