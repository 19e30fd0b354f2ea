#!/usr/bin/env node
import { runLink } from "../commands/link.js";
import { runMain } from "../commands/io.js";

runMain(runLink);
