/**
 * Parameter sweeps over the CRR pricers, written as CSV for an external plotter.
 *
 * Run:
 *   npm run sweep -- list
 *   npm run sweep -- run price-vs-barrier --out out
 *   npm run sweep -- price --instrument upAndInCall --maturity 4 --barrier 8
 */

import { hideBin } from "yargs/helpers";
import { runCli } from "../cli";

process.exitCode = runCli(hideBin(process.argv));
