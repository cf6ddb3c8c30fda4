#!/usr/bin/env -S node --import tsx

import { CLI } from "./lib/master/cli.ts";

process.exitCode = await new CLI().run();
