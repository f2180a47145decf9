#!/usr/bin/env node
import { main } from './index';

void main().then((code) => {
  process.exitCode = code;
});
