import { ExitCode, errorMessage } from '@adbcam/core';
import { runCli } from './cli';

runCli().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error('Fatal error:', errorMessage(error));
    process.exit(ExitCode.Failure);
  }
);
