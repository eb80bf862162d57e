#!/usr/bin/env node
import { createBuildCommand } from "./commands/build.js";
import { resolveProjectPaths } from "./utils/paths.js";

// Root is the parent of this script's directory (src/ or dist/)
const paths = resolveProjectPaths(import.meta.url);
const program = createBuildCommand(paths).version("0.1.0");

await program.parseAsync();
