#!/usr/bin/env tsx
import { GeneratePipeline } from "@plantforge/core";
import { CLI } from "./cli";

const cli = new CLI(new GeneratePipeline());
const exitCode = await cli.run(process.argv.slice(2));
process.exit(exitCode);
