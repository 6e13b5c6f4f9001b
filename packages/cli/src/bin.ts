#!/usr/bin/env node
import { run } from './main.js';
import { asError, panic } from './util.js';

run().catch(e => panic(asError(e)));
