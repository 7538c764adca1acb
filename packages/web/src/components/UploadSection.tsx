interface UploadSectionProps {
  file: File | null;
  onFileChange: (file: File | null) => void;
  disabled?: boolean;
}

export function UploadSection({ file, onFileChange, disabled }: UploadSectionProps) {
  return (
    <section>
      <h2 style={styles.heading}>Upload Data</h2>
      <label style={styles.label} htmlFor="export-file">
        Glooko export (.zip)
      </label>
      <input
        id="export-file"
        type="file"
        accept=".zip"
        onChange={(e) => onFileChange(e.target.files?.[0] ?? null)}
        disabled={disabled}
        style={styles.input}
      />
      {file && <p style={styles.selected}>Selected: {file.name}</p>}
    </section>
  );
}

const styles: { [key: string]: React.CSSProperties } = {
  heading: {
    fontSize: "18px",
    fontWeight: 600,
    margin: "0 0 12px 0",
  },
  label: {
    display: "block",
    fontSize: "14px",
    fontWeight: 500,
    marginBottom: "8px",
  },
  input: {
    fontSize: "14px",
    color: "#c9d1d9",
  },
  selected: {
    fontSize: "13px",
    color: "#8b949e",
    margin: "8px 0 0 0",
  },
};
