#!/usr/bin/env node

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { createProgram } from "./cli";
import { isRecord } from "./lib/index";

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJson: unknown = JSON.parse(
	readFileSync(join(__dirname, "..", "package.json"), "utf-8"),
);
const version =
	isRecord(packageJson) && typeof packageJson.version === "string"
		? packageJson.version
		: "0.0.0";

createProgram(version)
	.parseAsync()
	.catch((error: unknown) => {
		console.error(error instanceof Error ? error.message : String(error));
		process.exit(1);
	});
