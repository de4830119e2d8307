import { config as loadEnv } from 'dotenv';
import { createCLI } from './cli/index.js';
import { createRuntime } from './runtime.js';
import { loadConfig } from './utils/config.js';
import { createAppContext } from './utils/context.js';
import { describeError } from './utils/errors.js';

loadEnv();

const context = createAppContext(loadConfig());

createCLI(() => createRuntime(context))
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    context.logger.error(`Command failed: ${describeError(error)}`);
    console.error(`Error: ${describeError(error)}`);
    process.exitCode = 1;
  });
