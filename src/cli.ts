#!/usr/bin/env node
/**
 * volctl CLI
 *
 * Command-line interface for managing storage volumes, snapshots and
 * devices through a storage service.
 */

import { execute } from './cli/runner.js';

process.exitCode = await execute(process.argv.slice(2));
