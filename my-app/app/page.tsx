"use client";

import { useEffect, useState } from "react";

type FieldName =
  | "name"
  | "position"
  | "address"
  | "email"
  | "phone"
  | "mobile"
  | "website"
  | "logoPath";

type Fields = Record<FieldName, string>;

const FIELDS: Array<{ name: FieldName; label: string; placeholder: string; required?: boolean }> = [
  { name: "name", label: "Name", placeholder: "e.g. John Doe", required: true },
  { name: "position", label: "Position", placeholder: "e.g. Software Engineer", required: true },
  { name: "address", label: "Address", placeholder: "e.g. Anytown, USA", required: true },
  { name: "email", label: "Email", placeholder: "e.g. john.doe@example.com", required: true },
  { name: "phone", label: "Phone", placeholder: "e.g. +1 555 0100" },
  { name: "mobile", label: "Mobile", placeholder: "e.g. +1 555 0101" },
  { name: "website", label: "Website", placeholder: "leave empty for the default" },
  { name: "logoPath", label: "Logo file (one of the configured logo files)", placeholder: "e.g. logo/logo.png" },
];

const emptyFields: Fields = {
  name: "",
  position: "",
  address: "",
  email: "",
  phone: "",
  mobile: "",
  website: "",
  logoPath: "",
};

const inputStyle = {
  padding: "10px 12px",
  borderRadius: 10,
  border: "1px solid #333",
};

export default function SignaturePage() {
  const [fields, setFields] = useState<Fields>(emptyFields);
  const [fieldErrors, setFieldErrors] = useState<Record<string, string>>({});
  const [error, setError] = useState<string | null>(null);
  const [isGenerating, setIsGenerating] = useState(false);
  const [previewUrl, setPreviewUrl] = useState<string | null>(null);

  const [profiles, setProfiles] = useState<string[]>([]);
  const [profileName, setProfileName] = useState("");

  useEffect(() => {
    void refreshProfiles();
  }, []);

  // release the previous preview blob when it is replaced
  useEffect(() => {
    return () => {
      if (previewUrl) URL.revokeObjectURL(previewUrl);
    };
  }, [previewUrl]);

  async function refreshProfiles() {
    try {
      const res = await fetch("/api/profiles");
      const body: unknown = await res.json();
      setProfiles(readStringList(body, "profiles"));
    } catch (e) {
      setError(messageOf(e));
    }
  }

  async function onGenerate() {
    setError(null);
    setFieldErrors({});
    setIsGenerating(true);

    try {
      const res = await fetch("/api/signature", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(fields),
      });

      if (!res.ok) {
        await showFailure(res, "Signature generation failed");
        return;
      }

      const blob = await res.blob();
      setPreviewUrl(URL.createObjectURL(blob));
    } catch (e) {
      setError(messageOf(e));
    } finally {
      setIsGenerating(false);
    }
  }

  async function onSaveProfile() {
    setError(null);
    setFieldErrors({});
    const res = await fetch("/api/profiles", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ profileName, fields }),
    });
    if (!res.ok) {
      await showFailure(res, "Saving the profile failed");
      return;
    }
    await refreshProfiles();
  }

  async function onLoadProfile(name: string) {
    setError(null);
    setFieldErrors({});
    if (!name) return;

    const res = await fetch(`/api/profiles/${encodeURIComponent(name)}`);
    if (!res.ok) {
      await showFailure(res, "Loading the profile failed");
      return;
    }
    const body: unknown = await res.json();
    const profile = readObject(body, "profile");
    const next = { ...emptyFields };
    for (const field of FIELDS) {
      const value = profile[field.name];
      next[field.name] = typeof value === "string" ? value : "";
    }
    setFields(next);
    setProfileName(name);
  }

  async function onDeleteProfile() {
    if (!profileName) return;
    const res = await fetch(`/api/profiles/${encodeURIComponent(profileName)}`, {
      method: "DELETE",
    });
    if (!res.ok) {
      await showFailure(res, "Deleting the profile failed");
      return;
    }
    setProfileName("");
    await refreshProfiles();
  }

  async function showFailure(res: Response, fallback: string) {
    const body: unknown = await res.json().catch(() => null);
    const perField = readObject(body, "fields");
    const next: Record<string, string> = {};
    for (const [key, value] of Object.entries(perField)) {
      if (typeof value === "string") next[key] = value;
    }
    setFieldErrors(next);

    const message = readObject(body, "").message;
    setError(typeof message === "string" ? message : fallback);
  }

  return (
    <div style={{ maxWidth: 560, margin: "40px auto" }}>
      <h1 style={{ fontSize: 20, fontWeight: 600, marginBottom: 16 }}>
        Email Signature
      </h1>

      <div style={{ display: "flex", gap: 8, marginBottom: 20 }}>
        <select
          value={profiles.includes(profileName) ? profileName : ""}
          onChange={(e) => void onLoadProfile(e.target.value)}
          style={inputStyle}
        >
          <option value="">Load profile…</option>
          {profiles.map((p) => (
            <option key={p} value={p}>
              {p}
            </option>
          ))}
        </select>
        <input
          value={profileName}
          onChange={(e) => setProfileName(e.target.value)}
          placeholder="Profile name"
          style={{
            ...inputStyle,
            flex: 1,
            borderColor: fieldErrors.profileName ? "tomato" : "#333",
          }}
        />
        <button type="button" onClick={() => void onSaveProfile()} style={inputStyle}>
          Save
        </button>
        <button type="button" onClick={() => void onDeleteProfile()} style={inputStyle}>
          Delete
        </button>
      </div>
      {fieldErrors.profileName && (
        <div style={{ color: "tomato", fontSize: 13, marginBottom: 12 }}>
          {fieldErrors.profileName}
        </div>
      )}

      <form
        onSubmit={(e) => {
          e.preventDefault();
          void onGenerate();
        }}
        style={{ display: "grid", gap: 12 }}
      >
        {FIELDS.map((field) => (
          <label key={field.name} style={{ display: "grid", gap: 6 }}>
            <span>
              {field.label}
              {field.required ? " *" : ""}
            </span>
            <input
              value={fields[field.name]}
              onChange={(e) => setFields({ ...fields, [field.name]: e.target.value })}
              placeholder={field.placeholder}
              style={{
                ...inputStyle,
                borderColor: fieldErrors[field.name] ? "tomato" : "#333",
              }}
            />
            {fieldErrors[field.name] && (
              <span style={{ color: "tomato", fontSize: 13 }}>{fieldErrors[field.name]}</span>
            )}
          </label>
        ))}

        <button
          type="submit"
          disabled={isGenerating}
          style={{
            ...inputStyle,
            fontWeight: 600,
            opacity: isGenerating ? 0.6 : 1,
          }}
        >
          {isGenerating ? "Generating…" : "Generate signature"}
        </button>

        {error && (
          <div style={{ color: "tomato", fontSize: 14 }}>
            {error}
          </div>
        )}
      </form>

      {previewUrl && (
        <div style={{ marginTop: 24, display: "grid", gap: 12 }}>
          <div
            style={{
              padding: 12,
              borderRadius: 10,
              border: "1px solid #ddd",
              background: "repeating-conic-gradient(#eee 0% 25%, #fff 0% 50%) 50% / 16px 16px",
            }}
          >
            <img src={previewUrl} alt="Signature preview" />
          </div>
          <a href={previewUrl} download="email_signature.png">
            Download PNG
          </a>
        </div>
      )}
    </div>
  );
}

/* =========================
 * Helpers
 * ========================= */

function readObject(body: unknown, key: string): Record<string, unknown> {
  const target = key && isRecord(body) ? body[key] : body;
  return isRecord(target) ? target : {};
}

function readStringList(body: unknown, key: string): string[] {
  const list = isRecord(body) ? body[key] : null;
  return Array.isArray(list) ? list.filter((v): v is string => typeof v === "string") : [];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function messageOf(e: unknown) {
  return e instanceof Error ? e.message : "Something went wrong";
}
