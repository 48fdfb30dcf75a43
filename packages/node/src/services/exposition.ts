/**
 * Prometheus text exposition (format 0.0.4).
 *
 * Shared by the gauge registry and the HTTP metrics collector so every
 * family on /metrics is written the same way.
 */

export type Labels = Readonly<Record<string, string>>;

export type MetricType = "counter" | "gauge" | "histogram";

export interface Sample {
  /** Appended to the family name, e.g. `_bucket`. */
  readonly suffix?: string;
  readonly labels?: Labels;
  readonly value: number;
}

export interface MetricFamily {
  readonly name: string;
  readonly help: string;
  readonly type: MetricType;
  readonly samples: readonly Sample[];
}

/**
 * Labels with their keys sorted, so two label sets that differ only in
 * insertion order are the same series.
 */
export function sortedLabels(labels: Labels): Labels {
  return Object.fromEntries(
    Object.entries(labels).sort(([a], [b]) => a.localeCompare(b)),
  );
}

/** Identity of a label set within one family. */
export function seriesKey(labels: Labels): string {
  return JSON.stringify(Object.entries(sortedLabels(labels)));
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

export function formatValue(value: number): string {
  if (Number.isNaN(value)) return "NaN";
  if (value === Infinity) return "+Inf";
  if (value === -Infinity) return "-Inf";
  return String(value);
}

export function formatSample(name: string, sample: Sample): string {
  const fullName = name + (sample.suffix ?? "");
  const pairs = Object.entries(sample.labels ?? {}).map(
    ([key, value]) => `${key}="${escapeLabelValue(value)}"`,
  );
  const labelStr = pairs.length > 0 ? `{${pairs.join(",")}}` : "";
  return `${fullName}${labelStr} ${formatValue(sample.value)}`;
}

/**
 * Render families in order. Empty input renders as the empty string;
 * otherwise the output ends with a newline.
 */
export function renderFamilies(families: Iterable<MetricFamily>): string {
  const lines: string[] = [];
  for (const family of families) {
    lines.push(`# HELP ${family.name} ${family.help}`);
    lines.push(`# TYPE ${family.name} ${family.type}`);
    for (const sample of family.samples) {
      lines.push(formatSample(family.name, sample));
    }
  }
  return lines.length > 0 ? lines.join("\n") + "\n" : "";
}
