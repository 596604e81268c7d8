// src/cli/index.ts

import { main } from "./main";

const code = await main(process.argv.slice(2), {
  env: process.env,
  stdin: process.stdin,
  out: (line) => process.stdout.write(line + "\n"),
});
process.exit(code);
