#!/usr/bin/env node
import { runOrganize } from "../commands/organize.js";
import { runMain } from "../commands/io.js";

runMain(runOrganize);
