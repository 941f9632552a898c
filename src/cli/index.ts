#!/usr/bin/env node

import dotenv from "dotenv";

// Silence dotenv 17+ console output
process.env.DOTENV_CONFIG_SILENT = "true";
dotenv.config();


import { Command } from "commander";
import {
    cacheDiscoverCommand,
    cacheFetchCommand,
    cacheRefsCommand,
    hookCommand,
    schemasCommand,
    sessionInitCommand,
    sessionLockCommand,
    sessionReadCommand,
    sessionUnlockCommand,
    sessionUpdateCommand,
    validateCommand,
} from "./commands/index.js";

const program = new Command();

program
    .name("agent-output")
    .description("Validate structured output of plugin sub-agents")
    .version("1.0.0");

program
    .command("validate")
    .description("Validate agent output from a file, or stdin with '-'")
    .argument("<input>", "Path to the agent output, or - for stdin")
    .option("-t, --type <schema>", "Schema to validate against (detected when omitted)")
    .option("-s, --strict", "Treat warnings as failures")
    .option("--json", "Print the outcome as JSON")
    .action(validateCommand);

program
    .command("hook")
    .description("PostToolUse hook: read a Task envelope or raw output on stdin, print a decision")
    .option("-a, --agent <name>", "Agent or schema name to validate against")
    .action(hookCommand);

program
    .command("schemas")
    .description("List the registered output schemas")
    .option("-f, --family <family>", "Only list one family (red-team|context-engineering)")
    .option("--agents", "List agent names and the schema each must satisfy")
    .option("--json", "Print as JSON")
    .action(schemasCommand);

const session = program
    .command("session")
    .description("Manage the context-engineering session state file");

session
    .command("init")
    .description("Create the state file with a new session ID")
    .argument("<plugin_path>", "Plugin directory")
    .option("--focus <area>", "Focus area (all|context|orchestration|handoff)", "all")
    .option("--mode <mode>", "Analysis mode (quick|standard|deep)", "standard")
    .option("--request <text>", "Original user request", "")
    .action(sessionInitCommand);

session
    .command("read")
    .description("Print the state, or one section of it, as YAML")
    .argument("<plugin_path>", "Plugin directory")
    .option("--field <section>", "Section to print (immutable|mutable|all)", "all")
    .action(sessionReadCommand);

session
    .command("update")
    .description("Replace one mutable field with a JSON value")
    .argument("<plugin_path>", "Plugin directory")
    .argument("<field>", "Mutable field name")
    .argument("<value>", "JSON value")
    .action(sessionUpdateCommand);

session
    .command("lock")
    .description("Take the session lock")
    .argument("<plugin_path>", "Plugin directory")
    .option("--holder <name>", "Agent name holding the lock")
    .action(sessionLockCommand);

session
    .command("unlock")
    .description("Release the session lock")
    .argument("<plugin_path>", "Plugin directory")
    .action(sessionUnlockCommand);

const cache = program
    .command("cache")
    .description("Manage file references in the session state");

cache
    .command("discover")
    .description("Add plugin files matching a glob to the cache, unloaded")
    .argument("<plugin_path>", "Plugin directory")
    .option("--pattern <glob>", "Glob relative to the plugin directory", "**/*.md")
    .action(cacheDiscoverCommand);

cache
    .command("fetch")
    .description("Load the content of one cached file")
    .argument("<plugin_path>", "Plugin directory")
    .argument("<file_id>", "File ID from discover or refs")
    .action(cacheFetchCommand);

cache
    .command("refs")
    .description("List cached file references")
    .argument("<plugin_path>", "Plugin directory")
    .option("--loaded-only", "Only files whose content is loaded")
    .option("--unloaded-only", "Only files not loaded yet")
    .action(cacheRefsCommand);

await program.parseAsync(process.argv);
