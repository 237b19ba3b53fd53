// examples/01-basic-conversion/main.ts
// Focus: loading typed objects from JSON data and dumping them back.

import { readFile } from "node:fs/promises";
import {
  createObservableContext,
  discriminatedConverterFactory,
  dump,
  formatErrorInfo,
  loadSafe,
  objectConverterFactory,
} from "../../packages/treecast-runtime/mod.ts";
import {
  CardPayment$,
  CashPayment$,
  type Order,
  Order$,
} from "./src/types.ts";

async function loadJson(relativePath: string): Promise<unknown> {
  const text = await readFile(new URL(relativePath, import.meta.url), "utf8");
  return JSON.parse(text);
}

const context = createObservableContext("orders");
context.converterFactories.unshift(
  discriminatedConverterFactory(
    { card: CardPayment$, cash: CashPayment$ },
    objectConverterFactory(),
    "method",
  ),
);

async function demoValid() {
  const data = await loadJson("./data/order.json");
  const result = loadSafe<Order>(Order$, data, { context });
  if (!result.ok) {
    console.error("Load failed unexpectedly\n" + formatErrorInfo(result.error));
    return;
  }
  const order = result.value;
  const total = order.lines.reduce((sum, line) => sum + line.total, 0);
  console.log(`\nOrder ${order.id} for ${order.customer.name}: ${total.toFixed(2)}`);
  console.log("Placed at", order.placedAt.toISOString());
  console.log("Dumped back:", JSON.stringify(dump(order, context), null, 2));
}

async function demoInvalid() {
  const data = await loadJson("./data/order-invalid.json");
  const result = loadSafe<Order>(Order$, data, { context });
  if (!result.ok) {
    console.log("\nRejected order:\n" + formatErrorInfo(result.error));
  }
}

await demoValid();
await demoInvalid();
