#!/usr/bin/env -S node --import tsx
import { runCli } from "./program.js";

void runCli(process.argv);
