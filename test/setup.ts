/**
 * Runs before every test file. Keeps log files and state out of the real
 * home directory and drops inherited overrides that would change defaults.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

process.env.LIFTOFF_STATE_DIR = fs.mkdtempSync(path.join(os.tmpdir(), "liftoff-state-"));
delete process.env.LIFTOFF_HOME;
delete process.env.LIFTOFF_LOG_LEVEL;
