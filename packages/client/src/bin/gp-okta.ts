#!/usr/bin/env node

import { main } from '../cli.js';

main(process.argv).then(
  code => process.exit(code),
  (error: unknown) => {
    process.stderr.write(`gp-okta: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
  }
);
