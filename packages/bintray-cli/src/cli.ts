#!/usr/bin/env node
import { Cli } from "clipanion";

import { createCli } from "./index.js";

const [, , ...args] = process.argv;

await createCli().runExit(args, Cli.defaultContext);
