#!/usr/bin/env node

import { createProgram } from './program.js';
import { Session } from './session.js';

const session = new Session();
const program = createProgram(session);

try {
  program.parse();
} finally {
  session.close();
}

process.exitCode = session.exitCode;
