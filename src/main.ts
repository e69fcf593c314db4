#!/usr/bin/env node
import { runCli } from './cli';

// runCli reports and exits on every startup failure; nothing is left to reject.
void runCli();
