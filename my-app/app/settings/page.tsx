"use client";

import { useEffect, useState } from "react";

const DIMENSIONS = [
  { key: "margin", label: "Margin (px)" },
  { key: "logoHeight", label: "Logo height (px)" },
  { key: "logoMarginRight", label: "Logo to text gap (px)" },
  { key: "lineHeight", label: "Line height (px)" },
  { key: "confidentialityLineHeight", label: "Notice line height (px)" },
  { key: "separatorThickness", label: "Separator thickness (px)" },
] as const;

const COLORS = [
  { key: "name", label: "Name" },
  { key: "details", label: "Details" },
  { key: "separator", label: "Separator" },
  { key: "confidentiality", label: "Notice" },
  { key: "outline", label: "Outline" },
] as const;

const ELEMENT_LABELS: Record<string, string> = {
  logo: "Logo",
  name: "Name",
  position: "Position",
  address: "Address",
  phone: "Phone",
  mobile: "Mobile",
  email: "Email",
  website: "Website",
  separator: "Separator",
  confidentiality: "Confidentiality notice",
};

type Color = number[];

type Settings = {
  dimensions: Record<string, string>;
  colors: Record<string, Color>;
  defaultWebsite: string;
  confidentialityText: string;
  elementOrder: string[];
};

const inputStyle = {
  padding: "8px 10px",
  borderRadius: 10,
  border: "1px solid #333",
};

export default function SettingsPage() {
  const [settings, setSettings] = useState<Settings | null>(null);
  const [issues, setIssues] = useState<string[]>([]);
  const [status, setStatus] = useState<string | null>(null);

  useEffect(() => {
    void load();
  }, []);

  async function load() {
    const res = await fetch("/api/settings");
    const body: unknown = await res.json();
    if (!res.ok) {
      setIssues(readIssues(body));
      return;
    }
    setSettings(toSettings(isRecord(body) ? body.config : null));
  }

  async function onSave() {
    if (!settings) return;
    setIssues([]);
    setStatus(null);

    const patch: Record<string, unknown> = {
      colors: settings.colors,
      defaultWebsite: settings.defaultWebsite,
      confidentialityText: settings.confidentialityText,
      elementOrder: settings.elementOrder,
    };
    for (const { key } of DIMENSIONS) patch[key] = Number(settings.dimensions[key]);

    const res = await fetch("/api/settings", {
      method: "PUT",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(patch),
    });
    const body: unknown = await res.json().catch(() => null);
    if (!res.ok) {
      setIssues(readIssues(body));
      return;
    }
    setSettings(toSettings(isRecord(body) ? body.config : null));
    setStatus("Saved. The next signature uses these settings.");
  }

  function moveElement(index: number, delta: -1 | 1) {
    if (!settings) return;
    const target = index + delta;
    if (target < 0 || target >= settings.elementOrder.length) return;
    const order = [...settings.elementOrder];
    [order[index], order[target]] = [order[target], order[index]];
    setSettings({ ...settings, elementOrder: order });
  }

  if (!settings) {
    return <div style={{ maxWidth: 560, margin: "40px auto" }}>Loading settings…</div>;
  }

  return (
    <div style={{ maxWidth: 560, margin: "40px auto", display: "grid", gap: 16 }}>
      <h1 style={{ fontSize: 20, fontWeight: 600 }}>Settings</h1>

      <section style={{ display: "grid", gap: 10 }}>
        {DIMENSIONS.map(({ key, label }) => (
          <label key={key} style={{ display: "grid", gridTemplateColumns: "1fr 120px", gap: 8 }}>
            <span>{label}</span>
            <input
              type="number"
              min={1}
              value={settings.dimensions[key]}
              onChange={(e) =>
                setSettings({
                  ...settings,
                  dimensions: { ...settings.dimensions, [key]: e.target.value },
                })
              }
              style={inputStyle}
            />
          </label>
        ))}
      </section>

      <section style={{ display: "grid", gap: 10 }}>
        {COLORS.map(({ key, label }) => (
          <label key={key} style={{ display: "grid", gridTemplateColumns: "1fr 120px", gap: 8 }}>
            <span>{label} color</span>
            <input
              type="color"
              value={toHex(settings.colors[key])}
              onChange={(e) =>
                setSettings({
                  ...settings,
                  colors: { ...settings.colors, [key]: fromHex(e.target.value, settings.colors[key]) },
                })
              }
            />
          </label>
        ))}
      </section>

      <label style={{ display: "grid", gap: 6 }}>
        <span>Default website</span>
        <input
          value={settings.defaultWebsite}
          onChange={(e) => setSettings({ ...settings, defaultWebsite: e.target.value })}
          style={inputStyle}
        />
      </label>

      <label style={{ display: "grid", gap: 6 }}>
        <span>Confidentiality notice (empty to hide)</span>
        <textarea
          value={settings.confidentialityText}
          onChange={(e) => setSettings({ ...settings, confidentialityText: e.target.value })}
          rows={3}
          style={inputStyle}
        />
      </label>

      <section style={{ display: "grid", gap: 6 }}>
        <span>Element order (top to bottom)</span>
        {settings.elementOrder.map((id, index) => (
          <div
            key={id}
            style={{ display: "grid", gridTemplateColumns: "1fr 40px 40px", gap: 8, alignItems: "center" }}
          >
            <span>{ELEMENT_LABELS[id] ?? id}</span>
            <button
              type="button"
              onClick={() => moveElement(index, -1)}
              disabled={index === 0}
              style={inputStyle}
            >
              ↑
            </button>
            <button
              type="button"
              onClick={() => moveElement(index, 1)}
              disabled={index === settings.elementOrder.length - 1}
              style={inputStyle}
            >
              ↓
            </button>
          </div>
        ))}
      </section>

      <button type="button" onClick={() => void onSave()} style={{ ...inputStyle, fontWeight: 600 }}>
        Save settings
      </button>

      {status && <div style={{ color: "seagreen", fontSize: 14 }}>{status}</div>}
      {issues.map((issue) => (
        <div key={issue} style={{ color: "tomato", fontSize: 14 }}>
          {issue}
        </div>
      ))}
    </div>
  );
}

/* =========================
 * Helpers
 * ========================= */

function toSettings(config: unknown): Settings {
  const c = isRecord(config) ? config : {};
  const colors = isRecord(c.colors) ? c.colors : {};

  const dimensions: Record<string, string> = {};
  for (const { key } of DIMENSIONS) dimensions[key] = String(c[key] ?? "");

  const colorValues: Record<string, Color> = {};
  for (const { key } of COLORS) {
    const value = colors[key];
    colorValues[key] = Array.isArray(value) ? value.filter((n): n is number => typeof n === "number") : [0, 0, 0];
  }

  return {
    dimensions,
    colors: colorValues,
    defaultWebsite: typeof c.defaultWebsite === "string" ? c.defaultWebsite : "",
    confidentialityText: typeof c.confidentialityText === "string" ? c.confidentialityText : "",
    elementOrder: Array.isArray(c.elementOrder)
      ? c.elementOrder.filter((id): id is string => typeof id === "string")
      : Object.keys(ELEMENT_LABELS),
  };
}

function toHex(color: Color) {
  return `#${color
    .slice(0, 3)
    .map((n) => n.toString(16).padStart(2, "0"))
    .join("")}`;
}

/** Keeps the alpha channel of the previous color, if it had one. */
function fromHex(hex: string, previous: Color): Color {
  const rgb = [1, 3, 5].map((i) => parseInt(hex.slice(i, i + 2), 16));
  return previous.length === 4 ? [...rgb, previous[3] ?? 255] : rgb;
}

function readIssues(body: unknown): string[] {
  if (!isRecord(body)) return ["Request failed"];
  if (Array.isArray(body.issues)) return body.issues.map(String);
  return [typeof body.message === "string" ? body.message : "Request failed"];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
