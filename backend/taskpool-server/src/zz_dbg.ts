import { TaskScheduler } from "./queue/TaskScheduler";
import { createSilentLogger } from "./testUtils";
const s = new TaskScheduler({ maxWorkers: 2, logger: createSilentLogger() } as any);
s.submit((ctx: any) => new Promise<string>((r) => { console.log("handler runs, aborted=", ctx.signal.aborted); ctx.signal.addEventListener("abort", () => r("x")); }), [], { name: "w" });
console.log("startAll", s.startAll());
s.cancel(); console.log("cancelled");
setTimeout(()=>console.log(JSON.stringify(s.get("w"))),50);
