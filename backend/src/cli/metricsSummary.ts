import { buildContext } from "../context";
import { summarizeTraces } from "../services/reports/metricsSummary";

try {
  const traces = buildContext().traceStore.load();
  if (traces.length === 0) {
    console.log("No traces found. Run some evals first.");
  } else {
    console.log(JSON.stringify(summarizeTraces(traces), null, 2));
  }
} catch (error) {
  console.error("Metrics summary failed:", error);
  process.exitCode = 1;
}
