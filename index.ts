#!/usr/bin/env tsx
import { Command } from "commander";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { readFileSync } from "node:fs";
import copy from "@/commands/copy";
import count from "@/commands/count";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const pkg: { version: string } = JSON.parse(
	readFileSync(join(__dirname, "package.json"), "utf8"),
);

const program = new Command();

program
	.name("treecp")
	.description("Copy files and directory trees with a progress line")
	.version(pkg.version, "-v, --version", "display version number");

const commands = [copy, count];

for (const command of commands) {
	command(program);
}

await program.parseAsync();
