#!/usr/bin/env node
import { runDotfiles } from "../commands/dotfiles.js";
import { runMain } from "../commands/io.js";

runMain(runDotfiles);
