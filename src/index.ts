#!/usr/bin/env node
/**
 * image-retag CLI entrypoint
 */

import { run } from './cli.js';

run();
