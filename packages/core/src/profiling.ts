// ipaseg/profiling - Call counters and timings for the hot paths
// Enable with: IPASEG_PROFILE=1 or IPASEG_PROFILE=true

const ENABLE_PROFILING = process.env.IPASEG_PROFILE === '1' || process.env.IPASEG_PROFILE === 'true';

export const PERF_COUNTERS = {
  tokenize: { calls: 0, time: 0 },
  classify: { calls: 0, time: 0 },
  buildSegment: { calls: 0, time: 0 },
};

export type PerfCounter = keyof typeof PERF_COUNTERS;

// Inline profiling helper - no-op when profiling disabled
export function startTimer(counter: PerfCounter): () => void {
  if (!ENABLE_PROFILING) return () => {};

  const start = performance.now();
  PERF_COUNTERS[counter].calls++;

  return () => {
    PERF_COUNTERS[counter].time += performance.now() - start;
  };
}

export function resetPerfCounters(): void {
  for (const stats of Object.values(PERF_COUNTERS)) {
    stats.calls = 0;
    stats.time = 0;
  }
}

export function printPerfCountersAndReset(): void {
  if (!ENABLE_PROFILING) return;

  console.log('\n' + '='.repeat(72));
  console.log('PERFORMANCE COUNTERS');
  console.log('='.repeat(72));

  const sorted = Object.entries(PERF_COUNTERS)
    .filter(([, stats]) => stats.calls > 0)
    .sort((a, b) => b[1].time - a[1].time);

  for (const [name, stats] of sorted) {
    const avg = stats.time / stats.calls;
    console.log(`${name.padEnd(15)} ${stats.calls.toString().padEnd(8)} calls  ${stats.time.toFixed(2).padStart(10)}ms total  ${avg.toFixed(3).padStart(8)}ms avg`);
  }
  console.log('='.repeat(72) + '\n');

  resetPerfCounters();
}

export function isProfilingEnabled(): boolean {
  return ENABLE_PROFILING;
}
