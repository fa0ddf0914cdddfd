import path from "node:path";

import { getArg, getAsOfArg, getPositiveIntArg } from "./lib/args";
import { loadIndexInstruments, loadMarketConfig } from "../src/market/config";
import { runMarketReport } from "../src/market/pipeline";

const MAX_UNIVERSE = 6000;
const MAX_CONCURRENCY = 16;

const argv = process.argv.slice(2);
const rootDir = path.resolve(getArg(argv, "root") ?? process.cwd());

const config = await loadMarketConfig(rootDir);
const indices = await loadIndexInstruments(rootDir);

const top = getPositiveIntArg(argv, "top", MAX_UNIVERSE);
if (top !== undefined) {
  config.universe.size = top;
}
const concurrency = getPositiveIntArg(argv, "concurrency", MAX_CONCURRENCY);
if (concurrency !== undefined) {
  config.fetch.concurrency = concurrency;
}
const out = getArg(argv, "out");
if (out !== undefined) {
  config.output.dir = path.resolve(out);
}

const res = await runMarketReport({ config, indices, now: getAsOfArg(argv) });
console.log(JSON.stringify({ stage: "all", ...res }, null, 2));
