#!/usr/bin/env node
/**
 * apt-show-versions CLI entrypoint
 */

import { main } from './cli.js';

await main(process.argv);
