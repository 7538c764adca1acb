import type { AnalyzeResponse } from "../api/client";

interface ResultsProps {
  result: AnalyzeResponse;
  onBack: () => void;
}

export function Results({ result, onBack }: ResultsProps) {
  const { summary } = result;

  return (
    <div style={styles.container}>
      <h1 style={styles.title}>Analysis Results</h1>
      <p style={styles.meta}>
        {summary.glucose.readingCount} CGM readings
        {summary.dataStart && summary.dataEnd
          ? `, ${summary.dataStart.slice(0, 10)} to ${summary.dataEnd.slice(0, 10)}`
          : ""}
        {` · ${result.model}`}
      </p>

      <pre style={styles.recommendation}>{result.recommendation}</pre>

      <p style={styles.disclaimer}>
        Review any change with your care team before adjusting your pump.
      </p>

      <a
        href="#"
        onClick={(e) => {
          e.preventDefault();
          onBack();
        }}
        style={styles.backLink}
      >
        ← Back
      </a>
    </div>
  );
}

const styles: { [key: string]: React.CSSProperties } = {
  container: {
    maxWidth: "800px",
    margin: "0 auto",
    padding: "40px 20px",
    color: "#c9d1d9",
  },
  title: {
    fontSize: "24px",
    fontWeight: 600,
    margin: "0 0 8px 0",
  },
  meta: {
    fontSize: "14px",
    color: "#8b949e",
    margin: "0 0 24px 0",
  },
  recommendation: {
    background: "#161b22",
    border: "1px solid #30363d",
    borderRadius: "12px",
    padding: "24px",
    whiteSpace: "pre-wrap",
    fontSize: "14px",
    lineHeight: 1.5,
  },
  disclaimer: {
    fontSize: "13px",
    color: "#8b949e",
  },
  backLink: {
    color: "#58a6ff",
    fontSize: "14px",
    textDecoration: "none",
  },
};
