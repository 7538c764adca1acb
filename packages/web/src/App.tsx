import { useState } from "react";
import { analyzeExport, type AnalyzeResponse, type SettingsForm } from "./api/client";
import { SettingsTable } from "./components/SettingsTable";
import { UploadSection } from "./components/UploadSection";
import { createDefaultForm } from "./lib/settings-form";
import { Results } from "./pages/Results";

export function App() {
  const [file, setFile] = useState<File | null>(null);
  const [settings, setSettings] = useState<SettingsForm>(() => createDefaultForm());
  const [result, setResult] = useState<AnalyzeResponse | null>(null);
  const [error, setError] = useState("");
  const [submitting, setSubmitting] = useState(false);

  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault();

    if (!file) {
      setError("Please choose a .zip export");
      return;
    }
    if (!file.name.toLowerCase().endsWith(".zip")) {
      setError("Only .zip exports are supported");
      return;
    }

    setSubmitting(true);
    setError("");
    try {
      setResult(await analyzeExport(file, settings));
    } catch (err) {
      setError(err instanceof Error ? err.message : "Analysis failed");
    } finally {
      setSubmitting(false);
    }
  };

  if (result) {
    return <Results result={result} onBack={() => setResult(null)} />;
  }

  return (
    <div style={styles.container}>
      <h1 style={styles.title}>Insulin Pump Settings Analyzer</h1>
      <p style={styles.subtitle}>
        Upload a Glooko export and your current pump settings to get a basal rate review.
      </p>

      <form onSubmit={(e) => void handleSubmit(e)} style={styles.card}>
        <UploadSection file={file} onFileChange={setFile} disabled={submitting} />
        <SettingsTable value={settings} onChange={setSettings} disabled={submitting} />

        {error && <p style={styles.error}>{error}</p>}

        <button type="submit" style={styles.button} disabled={submitting}>
          {submitting ? "Analyzing..." : "Analyze"}
        </button>
      </form>
    </div>
  );
}

const styles: { [key: string]: React.CSSProperties } = {
  container: {
    maxWidth: "900px",
    margin: "0 auto",
    padding: "40px 20px",
    color: "#c9d1d9",
  },
  title: {
    fontSize: "24px",
    fontWeight: 600,
    margin: "0 0 8px 0",
  },
  subtitle: {
    fontSize: "14px",
    color: "#8b949e",
    margin: "0 0 24px 0",
  },
  card: {
    background: "#161b22",
    border: "1px solid #30363d",
    borderRadius: "12px",
    padding: "32px",
  },
  error: {
    color: "#f85149",
    fontSize: "14px",
    margin: "16px 0 0 0",
  },
  button: {
    marginTop: "24px",
    padding: "12px 24px",
    fontSize: "16px",
    fontWeight: 500,
    background: "#238636",
    color: "#fff",
    border: "none",
    borderRadius: "6px",
    cursor: "pointer",
  },
};
