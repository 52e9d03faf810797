import {
  Bar,
  BarChart,
  CartesianGrid,
  Cell,
  LabelList,
  ReferenceLine,
  ResponsiveContainer,
  XAxis,
  YAxis,
} from "recharts";
import {
  GLUCOSE_SCALE,
  GLUCOSE_SCALE_MAX,
  GLUCOSE_THRESHOLDS,
} from "../src/categorize";
import { formatPercent } from "../src/recommendations";
import type { FeatureContribution } from "../src/types";

/**
 * Horizontal band chart of the five glucose categories with the user's value
 * marked on top.
 */
export function GlucoseScaleChart({ glucose }: { glucose: number }) {
  const row: Record<string, string | number> = { name: "Glukosa" };
  GLUCOSE_SCALE.forEach((band, i) => {
    row[`b${i}`] = band.end - band.start;
  });

  return (
    <ResponsiveContainer width="100%" height={140}>
      <BarChart
        data={[row]}
        layout="vertical"
        margin={{ top: 24, right: 20, left: 20, bottom: 8 }}
      >
        <XAxis
          type="number"
          domain={[0, GLUCOSE_SCALE_MAX]}
          ticks={[0, ...GLUCOSE_THRESHOLDS, GLUCOSE_SCALE_MAX]}
          label={{
            value: "Glukosa Plasma (mg/dL)",
            position: "insideBottom",
            offset: -4,
          }}
        />
        <YAxis type="category" dataKey="name" hide />
        {GLUCOSE_SCALE.map((band, i) => (
          <Bar
            key={band.label}
            dataKey={`b${i}`}
            stackId="scale"
            fill={band.color}
            fillOpacity={0.7}
            name={band.label}
          >
            <LabelList
              dataKey={`b${i}`}
              position="center"
              fill="#fff"
              formatter={() => band.label}
            />
          </Bar>
        ))}
        {GLUCOSE_THRESHOLDS.map((t) => (
          <ReferenceLine
            key={t}
            x={t}
            stroke="#000"
            strokeDasharray="4 4"
            strokeOpacity={0.5}
          />
        ))}
        <ReferenceLine
          x={glucose}
          stroke="#000"
          strokeWidth={3}
          label={{
            value: `${glucose} mg/dL`,
            position: "top",
            fontWeight: "bold",
          }}
        />
      </BarChart>
    </ResponsiveContainer>
  );
}

const CLASS_COLORS = ["#28a745", "#dc3545"];

export function ProbabilityChart({
  probabilities,
}: {
  probabilities: readonly [number, number];
}) {
  const data = [
    { name: "Non-Diabetes", p: probabilities[0] },
    { name: "Diabetes", p: probabilities[1] },
  ];

  return (
    <ResponsiveContainer width="100%" height={260}>
      <BarChart data={data} margin={{ top: 24, right: 20, left: 0, bottom: 8 }}>
        <CartesianGrid vertical={false} strokeOpacity={0.3} />
        <XAxis dataKey="name" />
        <YAxis
          domain={[0, 1]}
          tickFormatter={(v: number) => formatPercent(v)}
        />
        <Bar dataKey="p" fillOpacity={0.8}>
          {data.map((d, i) => (
            <Cell key={d.name} fill={CLASS_COLORS[i]} />
          ))}
          <LabelList
            dataKey="p"
            position="top"
            formatter={(v: unknown) => formatPercent(Number(v))}
          />
        </Bar>
      </BarChart>
    </ResponsiveContainer>
  );
}

export function FeatureImportanceChart({
  contributions,
}: {
  contributions: FeatureContribution[];
}) {
  return (
    <ResponsiveContainer width="100%" height={320}>
      <BarChart
        data={contributions}
        layout="vertical"
        margin={{ top: 8, right: 48, left: 16, bottom: 8 }}
      >
        <CartesianGrid horizontal={false} strokeOpacity={0.3} />
        <XAxis type="number" />
        <YAxis type="category" dataKey="label" width={180} />
        <Bar dataKey="importance" fillOpacity={0.8}>
          {contributions.map((c) => (
            <Cell
              key={c.key}
              fill={c.key === "glucose" ? "#3498db" : "#95a5a6"}
              stroke={c.key === "glucose" ? "red" : "#000"}
              strokeWidth={c.key === "glucose" ? 2 : 1}
            />
          ))}
          <LabelList
            dataKey="importance"
            position="right"
            formatter={(v: unknown) => Number(v).toFixed(3)}
          />
        </Bar>
      </BarChart>
    </ResponsiveContainer>
  );
}
