#!/usr/bin/env node
import { createProgram } from './program';

createProgram().parse();
