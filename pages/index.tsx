import dynamic from "next/dynamic";
import { useEffect, useMemo, useState } from "react";
import type { MetaResponse, PredictResponse } from "../src/api-types";
import {
  categorizeBloodPressure,
  categorizeBmi,
  categorizeGlucose,
  glucoseChecklist,
  glucoseStatus,
  interpretPedigree,
} from "../src/categorize";
import { ScreeningClient, submitAndRefresh } from "../src/client";
import { defaultPatientInput, FIELD_SPECS } from "../src/input";
import {
  disclaimerLines,
  formatPercent,
  sidebarGlucoseWarning,
} from "../src/recommendations";
import type {
  ColorHint,
  FieldKey,
  HistoryEntry,
  PatientInput,
} from "../src/types";

// Recharts renders client-side only (avoids SSR measuring issues)
const GlucoseScaleChart = dynamic(
  () => import("../components/Charts").then((m) => m.GlucoseScaleChart),
  { ssr: false }
);
const ProbabilityChart = dynamic(
  () => import("../components/Charts").then((m) => m.ProbabilityChart),
  { ssr: false }
);
const FeatureImportanceChart = dynamic(
  () => import("../components/Charts").then((m) => m.FeatureImportanceChart),
  { ssr: false }
);

const TONE: Record<ColorHint, string> = {
  green: "#28a745",
  orange: "#e0a800",
  red: "#dc3545",
};

function errorText(e: unknown, fallback: string): string {
  return e instanceof Error ? e.message : fallback;
}

export default function Home() {
  // One client per page; it carries the session id between calls.
  const [client] = useState(() => new ScreeningClient());
  const [values, setValues] = useState<PatientInput>(defaultPatientInput());
  const [meta, setMeta] = useState<MetaResponse | null>(null);
  const [current, setCurrent] = useState<PredictResponse | null>(null);
  const [history, setHistory] = useState<HistoryEntry[]>([]);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const status = useMemo(() => glucoseStatus(values.glucose), [values.glucose]);
  const bmi = useMemo(() => categorizeBmi(values.bmi), [values.bmi]);
  const sidebarWarning = sidebarGlucoseWarning(values.glucose);
  const checklist = glucoseChecklist(values.glucose);
  const liveCategory = categorizeGlucose(values.glucose);

  const predictionDisabled = meta !== null && !meta.artifacts.ready;

  useEffect(() => {
    client
      .meta()
      .then(setMeta)
      .catch((e: unknown) => {
        setError(errorText(e, "Gagal memuat konfigurasi"));
      });
  }, [client]);

  async function submit(): Promise<void> {
    setLoading(true);
    setError(null);

    const outcome = await submitAndRefresh(client, values);
    setCurrent(outcome.prediction);
    if (outcome.history) setHistory(outcome.history);
    setError(outcome.error);
    setLoading(false);
  }

  async function clearHistory(): Promise<void> {
    setError(null);
    try {
      await client.clearHistory();
      setHistory([]);
    } catch (e) {
      setError(errorText(e, "Gagal menghapus riwayat"));
    }
  }

  function setField(key: FieldKey, raw: string): void {
    setValues((prev) => ({ ...prev, [key]: Number(raw) }));
  }

  return (
    <main
      style={{
        display: "flex",
        gap: 24,
        padding: "0 1rem",
        fontFamily: "sans-serif",
      }}
    >
      <aside style={{ width: 320, flexShrink: 0 }}>
        <h2>Parameter Kesehatan</h2>

        {FIELD_SPECS.map((f) => (
          <div key={f.key} style={{ marginTop: 12 }}>
            <label title={f.help}>
              <strong>{f.label}</strong>
              {f.unit ? ` (${f.unit})` : ""}:{" "}
              <code>{values[f.key].toFixed(f.decimals)}</code>
              <br />
              <input
                type="range"
                min={f.min}
                max={f.max}
                step={f.step}
                value={values[f.key]}
                onChange={(e) => setField(f.key, e.target.value)}
                style={{ width: "100%" }}
              />
            </label>
            {f.key === "glucose" ? (
              <div
                style={{ color: TONE[status.colorHint], fontWeight: "bold" }}
              >
                Status Glukosa: {status.band}
              </div>
            ) : null}
            {f.key === "bmi" ? <small>Status BMI: {bmi.label}</small> : null}
            {f.key === "bloodPressure" ? (
              <small>
                Kategori: {categorizeBloodPressure(values.bloodPressure)}
              </small>
            ) : null}
            {f.key === "diabetesPedigree" ? (
              <small>
                Risiko keluarga: {interpretPedigree(values.diabetesPedigree)}
              </small>
            ) : null}
          </div>
        ))}

        {sidebarWarning ? (
          <p style={{ color: "crimson", marginTop: 16 }}>
            <strong>PERINGATAN: Nilai Glukosa Tinggi!</strong> {sidebarWarning}
          </p>
        ) : null}

        <div style={{ marginTop: 16 }}>
          <button
            onClick={() => void submit()}
            disabled={loading || predictionDisabled}
          >
            {loading ? "Menganalisis…" : "Lakukan Prediksi"}
          </button>{" "}
          {history.length > 0 ? (
            <button onClick={() => void clearHistory()} disabled={loading}>
              Clear History
            </button>
          ) : null}
        </div>

        <section style={{ marginTop: 24, fontSize: "0.85rem", color: "#555" }}>
          <h3>Disclaimer Medis</h3>
          <ul>
            {disclaimerLines().map((line) => (
              <li key={line}>{line}</li>
            ))}
          </ul>
        </section>
      </aside>

      <div style={{ flex: 1 }}>
        <h1 style={{ color: "#2E86AB", textAlign: "center" }}>
          Aplikasi Prediksi Diabetes
        </h1>

        {predictionDisabled && meta ? (
          <p style={{ color: "crimson" }}>
            Prediksi tidak tersedia: <code>{meta.artifacts.message}</code>
          </p>
        ) : null}

        {error ? (
          <p style={{ color: "crimson" }}>
            Error: <code>{error}</code>
          </p>
        ) : null}

        <section>
          <h2>Data Input Pasien</h2>
          <table cellPadding={6} style={{ borderCollapse: "collapse" }}>
            <tbody>
              {FIELD_SPECS.map((f) => (
                <tr key={f.key}>
                  <td>{f.label}</td>
                  <td align="right">
                    <code>{values[f.key].toFixed(f.decimals)}</code>{" "}
                    {f.unit ?? ""}
                  </td>
                </tr>
              ))}
            </tbody>
          </table>
          <p>
            Kategori Glukosa:{" "}
            <strong style={{ color: TONE[liveCategory.colorHint] }}>
              {liveCategory.label}
            </strong>
          </p>
        </section>

        <section>
          <h2>Skala Glukosa</h2>
          <GlucoseScaleChart glucose={values.glucose} />
          <p>
            <strong>Jika nilai puasa (8 jam):</strong> Normal &lt; 100{" "}
            {checklist.fasting.Normal ? "✅" : ""} · Prediabetes 100-125{" "}
            {checklist.fasting.Prediabetes ? "✅" : ""} · Diabetes ≥ 126{" "}
            {checklist.fasting.Diabetes ? "✅" : ""}
          </p>
          <p>
            <strong>Jika nilai 2 jam setelah makan:</strong> Normal &lt;
            140 {checklist.twoHour.Normal ? "✅" : ""} · Prediabetes 140-199{" "}
            {checklist.twoHour.Prediabetes ? "✅" : ""} · Diabetes ≥ 200{" "}
            {checklist.twoHour.Diabetes ? "✅" : ""}
          </p>
        </section>

        {current ? <PredictionPanel data={current} /> : null}

        {history.length > 0 ? (
          <section style={{ marginTop: 24 }}>
            <h2>Riwayat Prediksi</h2>
            {history.map((entry, i) => (
              <details key={entry.id}>
                <summary>
                  Prediksi {i + 1} -{" "}
                  {new Date(entry.createdAt).toLocaleString()} | Glukosa:{" "}
                  {entry.input.glucose} mg/dL
                </summary>
                <ul>
                  <li>
                    Status:{" "}
                    {entry.result.label === "NonDiabetic"
                      ? "Non-Diabetes ✅"
                      : "Diabetes ⚠️"}
                  </li>
                  <li>Kategori: {entry.category.label}</li>
                  <li>BMI: {entry.input.bmi.toFixed(1)} kg/m²</li>
                  <li>Tekanan Darah: {entry.input.bloodPressure} mm Hg</li>
                  <li>
                    Non-Diabetes:{" "}
                    {formatPercent(entry.result.probabilities[0])}
                  </li>
                  <li>
                    Diabetes: {formatPercent(entry.result.probabilities[1])}
                  </li>
                </ul>
              </details>
            ))}
          </section>
        ) : null}
      </div>
    </main>
  );
}

const RESULT_BOX = { padding: "1rem", borderRadius: 5 };

function PredictionPanel({ data }: { data: PredictResponse }) {
  const { entry, recommendations, warning, featureContributions } = data;
  const diabetic = entry.result.label === "Diabetic";
  const [pNon, pDiab] = entry.result.probabilities;

  return (
    <section style={{ marginTop: 24 }}>
      <h2>Hasil Prediksi</h2>
      <div style={{ display: "flex", gap: 24 }}>
        <div style={{ flex: 1 }}>
          {diabetic ? (
            <div style={{ ...RESULT_BOX, background: "#f8d7da" }}>
              <h3>⚠️ DIABETES</h3>
              <p>
                Berdasarkan analisis data, terdapat indikasi risiko diabetes.
              </p>
              <strong>Disarankan untuk konsultasi dengan dokter!</strong>
            </div>
          ) : (
            <div style={{ ...RESULT_BOX, background: "#d4edda" }}>
              <h3>✅ NON-DIABETES</h3>
              <p>
                Berdasarkan analisis data, risiko diabetes Anda termasuk
                rendah.
              </p>
            </div>
          )}
        </div>
        <div style={{ flex: 1 }}>
          <ProbabilityChart probabilities={entry.result.probabilities} />
          <p>
            Non-Diabetes: <strong>{formatPercent(pNon)}</strong> ·
            Diabetes: <strong>{formatPercent(pDiab)}</strong>
          </p>
        </div>
      </div>

      <h2>Analisis Detail Glukosa</h2>
      <p>
        Nilai Glukosa: <strong>{entry.input.glucose} mg/dL</strong> ·
        Kategori: <strong>{entry.detailedCategory.label}</strong> ·{" "}
        <span style={{ color: TONE[entry.category.colorHint] }}>
          Nilai {entry.category.band}
        </span>
      </p>

      {warning ? (
        <div style={{ color: "crimson" }}>
          <h3>{warning.title}</h3>
          <p>{warning.body}</p>
          <ol>
            {warning.actions.map((a) => (
              <li key={a}>{a}</li>
            ))}
          </ol>
        </div>
      ) : null}

      <h2>{recommendations.title}</h2>
      <p>{recommendations.summary}</p>
      {recommendations.sections.map((section, i) => (
        <div key={section.heading}>
          <h4>
            {i + 1}. {section.heading}
          </h4>
          <ul>
            {section.items.map((item) => (
              <li key={item}>{item}</li>
            ))}
          </ul>
        </div>
      ))}

      {featureContributions ? (
        <>
          <h2>Kontribusi Fitur dalam Prediksi</h2>
          <FeatureImportanceChart contributions={featureContributions} />
          <p>Glukosa (disorot biru) biasanya menjadi faktor paling penting.</p>
        </>
      ) : null}
    </section>
  );
}
