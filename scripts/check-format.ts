#!/usr/bin/env node
import { main } from "./homework-check";

// Allow running directly via `tsx scripts/check-format.ts`
if (require.main === module) {
  main()
    .then((exitCode: number) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      const message: string = error instanceof Error ? error.message : "Unknown error";
      // eslint-disable-next-line no-console
      console.error("Format check failed:", message);
      process.exitCode = 1;
    });
}
