#!/usr/bin/env node

/**
 * owui - command line for Open WebUI chats, folders and knowledge bases
 */

import { runCli } from './run.js';

process.exitCode = await runCli(process.argv.slice(2));
