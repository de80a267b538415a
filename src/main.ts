import fs from "fs";
import { optimizeOrdering } from "./pipeline.js";
import { loadRules, withQubits } from "./rules.js";

async function main() {
  const [outDir, rulesPath, qubitsArg, outJson] = process.argv.slice(2);
  const rules = outDir ? withQubits(loadRules(rulesPath), qubitsArg) : undefined;
  if (!outDir || !rules) {
    console.error("Usage: node dist/main.js <out-dir> [rules.yaml] [qubits|-] [report.json]");
    process.exit(1);
  }
  const report = optimizeOrdering({ outDir, rules });
  const data = JSON.stringify(report, null, 2);
  if (outJson) {
    fs.writeFileSync(outJson, data, "utf8");
  } else {
    process.stdout.write(`${data}\n`);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
