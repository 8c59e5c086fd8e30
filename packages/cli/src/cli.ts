#!/usr/bin/env node
import { main } from './program';

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
