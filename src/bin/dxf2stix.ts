// Run via: npm run convert -- [files...] [options]  (or: tsx src/bin/dxf2stix.ts)
import { main } from "@/cli";

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("[dxf2stix] Unexpected failure:", err);
    process.exitCode = 1;
  });
