#!/usr/bin/env node
import { main } from "./cli.mjs";

await main();
