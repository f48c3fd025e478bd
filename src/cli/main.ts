#!/usr/bin/env node
import { createMeshwireCli } from "./meshwire-cli.js";

createMeshwireCli()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
