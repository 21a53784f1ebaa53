import { buildProgram } from "./program.js";
import { loadToolVersion } from "./runtime-paths.js";

const program = buildProgram(await loadToolVersion());
await program.parseAsync(process.argv);
