import type { GlucoseUnit } from "@pump-advisor/diabetes";
import { GLUCOSE_UNITS } from "@pump-advisor/diabetes/settings";
import type { SettingsForm } from "../api/client";
import { changeUnits, updateRow, type EditableField } from "../lib/settings-form";

interface SettingsTableProps {
  value: SettingsForm;
  onChange: (next: SettingsForm) => void;
  disabled?: boolean;
}

const FIELDS: { field: EditableField; label: (unit: GlucoseUnit) => string; inputLabel: string }[] = [
  { field: "basalRate", label: () => "Basal Rate (U/hr)", inputLabel: "Basal rate" },
  { field: "correctionFactor", label: (unit) => `Correction Factor (1:${unit})`, inputLabel: "Correction factor" },
  { field: "carbRatio", label: () => "Carb Ratio (1:grams)", inputLabel: "Carb ratio" },
  { field: "targetBg", label: (unit) => `Target BG (${unit})`, inputLabel: "Target BG" },
];

export function SettingsTable({ value, onChange, disabled }: SettingsTableProps) {
  return (
    <section style={styles.section}>
      <h2 style={styles.heading}>Insulin Pump Settings</h2>

      <div role="radiogroup" aria-label="Glucose units" style={styles.units}>
        {GLUCOSE_UNITS.map((unit) => (
          <label key={unit} style={styles.unitOption}>
            <input
              type="radio"
              name="units"
              value={unit}
              checked={value.units === unit}
              onChange={() => onChange(changeUnits(value, unit))}
              disabled={disabled}
            />
            {unit}
          </label>
        ))}
      </div>

      <table style={styles.table}>
        <thead>
          <tr>
            <th style={styles.th}>Time</th>
            {FIELDS.map(({ field, label }) => (
              <th key={field} style={styles.th}>
                {label(value.units)}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {value.timedSettings.map((row, index) => (
            <tr key={row.timeRange}>
              <td style={styles.time}>{row.timeRange}</td>
              {FIELDS.map(({ field, inputLabel }) => (
                <td key={field} style={styles.td}>
                  <input
                    type="text"
                    aria-label={`${inputLabel} ${row.timeRange}`}
                    value={row[field]}
                    onChange={(e) => onChange(updateRow(value, index, field, e.target.value))}
                    disabled={disabled}
                    style={styles.input}
                  />
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </section>
  );
}

const styles: { [key: string]: React.CSSProperties } = {
  section: {
    marginTop: "24px",
  },
  heading: {
    fontSize: "18px",
    fontWeight: 600,
    margin: "0 0 12px 0",
  },
  units: {
    display: "flex",
    gap: "16px",
    marginBottom: "12px",
  },
  unitOption: {
    display: "flex",
    alignItems: "center",
    gap: "6px",
    fontSize: "14px",
  },
  table: {
    borderCollapse: "collapse",
    width: "100%",
    fontSize: "14px",
  },
  th: {
    textAlign: "left",
    padding: "6px 8px",
    borderBottom: "1px solid #30363d",
    color: "#8b949e",
    fontWeight: 500,
  },
  td: {
    padding: "2px 8px",
  },
  time: {
    padding: "2px 8px",
    fontFamily: "monospace",
  },
  input: {
    width: "100%",
    padding: "4px 8px",
    background: "#0d1117",
    border: "1px solid #30363d",
    borderRadius: "4px",
    color: "#c9d1d9",
    boxSizing: "border-box",
  },
};
