#!/usr/bin/env -S node --import tsx
import { main } from "./app/cli.ts";

main().catch((error: unknown) => {
  console.error(error instanceof Error ? `Error: ${error.message}` : error);
  process.exitCode = 1;
});
