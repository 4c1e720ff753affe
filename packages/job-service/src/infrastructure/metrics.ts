// packages/job-service/src/infrastructure/metrics.ts

// Minimal metrics facade. The default sink drops everything.

export interface MetricsTags {
  [key: string]: string | number | boolean | undefined;
}

export interface Metrics {
  increment(name: string, value?: number, tags?: MetricsTags): void;
  timing(name: string, ms: number, tags?: MetricsTags): void;
}

// metrics.declaration()
export const metrics: Metrics = {
  increment() {
    // noop
  },
  timing() {
    // noop
  },
};
