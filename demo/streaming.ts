// demo/streaming.ts
import { RollingWindow } from "../src/index.js";
import type { SampleEvictedEvent } from "../src/index.js";

const WINDOW = Number(process.env.WINDOW ?? 5);
const TOTAL = Number(process.env.TOTAL ?? 10);

const stats = new RollingWindow({ windowSize: WINDOW });
const std = stats.subscribeStd();
const zscore = stats.subscribeZScore();

stats.on("sample:evicted", (e: SampleEvictedEvent) => {
  // eslint-disable-next-line no-console
  console.log(`[evict] sample=${e.sample} remaining=${e.remaining}`);
});

for (let i = 0; i < TOTAL; i++) {
  stats.push(i);
  // eslint-disable-next-line no-console
  console.log(`n: ${stats.count.current}, std: ${std.current.toFixed(2)}, z: ${zscore.current.toFixed(2)}`);
}

// eslint-disable-next-line no-console
console.log(`[final snapshot]`, stats.snapshot());
