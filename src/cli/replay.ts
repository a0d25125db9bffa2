#!/usr/bin/env node
// src/cli/replay.ts

import { ConfigurationError, FeedError } from "../core/errors.js";
import { buildReplayProgram } from "./replayCommand.js";

try {
    buildReplayProgram().parse(process.argv);
} catch (error) {
    if (error instanceof ConfigurationError) {
        console.error("FATAL: configuration invalid");
        for (const issue of error.issues) {
            console.error(`  - ${issue}`);
        }
        console.error(error.message);
    } else if (error instanceof FeedError) {
        console.error(`FATAL: ${error.message} (${error.source})`);
    } else {
        console.error("FATAL:", error);
    }
    process.exitCode = 1;
}
