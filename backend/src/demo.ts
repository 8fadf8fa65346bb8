import { loadConfig } from "./config";
import { recommend, toResponse } from "./engine/recommend";
import type { RawRequest } from "./engine/normalize";
import { createLogger } from "./logger";
import { loadDoseTable } from "./table/loadDoseTable";

const scenarios: { name: string; data: RawRequest }[] = [
  {
    name: "High GRBS on IV route",
    data: { GRBS: [400, 380, 360, 340, 320], Insulin: [0, 0, 0, 0], route: "iv", diet_order: "NPO" },
  },
  {
    name: "SC route with two readings above 350",
    data: { GRBS: [380, 400, 350, 320, 300], Insulin: [2, 3, 2, 1], route: "sc", diet_order: "NPO" },
  },
  {
    name: "Dual inotropes forces IV",
    data: { GRBS: [180, 170, 160, 150, 140], Insulin: [2, 2, 1, 1], "Dual inotropes": true, route: "sc" },
  },
  {
    name: "Low GRBS on SC route",
    data: { GRBS: [90, 100, 110, 120, 130], Insulin: [2, 2, 2, 2], route: "sc", diet_order: "others" },
  },
  {
    name: "IV patient controlled across the last four readings",
    data: { GRBS: [170, 160, 155, 150, 145], Insulin: [1, 1, 1, 1], route: "iv" },
  },
  {
    name: "Missing GRBS",
    data: { Insulin: [1, 0, 0, 0], route: "sc" },
  },
];

async function main() {
  const config = loadConfig();
  const log = createLogger(config.logLevel);
  const { table } = await loadDoseTable(config.tablePath, log);

  for (const { name, data } of scenarios) {
    const result = recommend(data, table);
    const out = result.success
      ? toResponse(result.data)
      : { error: `Invalid input: ${result.error.message}` };
    console.log(`\n${name}`);
    console.log(JSON.stringify(out, null, 2));
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
