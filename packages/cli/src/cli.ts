#!/usr/bin/env node
import { Command } from "commander";
import { registerControllerCli } from "@fwsync/controller";

// Standalone entrypoint; `fwsync` without a sub-command runs the controller.
const program = new Command();
program.name("fwsync").description("Keep Hetzner Cloud firewalls open for your current public addresses");
registerControllerCli(program, { logger: console });
await program.parseAsync(process.argv);
