import fs from "node:fs/promises";
import path from "node:path";
import { createCanvas } from "@napi-rs/canvas";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import * as profileItem from "../my-app/app/api/profiles/[name]/route.ts";
import * as profiles from "../my-app/app/api/profiles/route.ts";
import * as settings from "../my-app/app/api/settings/route.ts";
import * as signature from "../my-app/app/api/signature/route.ts";
import { johnDoe, pngSize, tempDir } from "./helpers.ts";

let dir: string;
const saved = { config: process.env.SIGNATURE_CONFIG, profiles: process.env.SIGNATURE_PROFILES_DIR };

beforeEach(async () => {
  dir = await tempDir();
  const configFile = path.join(dir, "signature.config.json");
  process.env.SIGNATURE_CONFIG = configFile;
  process.env.SIGNATURE_PROFILES_DIR = path.join(dir, "profiles");
  await fs.writeFile(configFile, JSON.stringify({ confidentialityText: "Confidential." }));
});

afterEach(() => {
  restore("SIGNATURE_CONFIG", saved.config);
  restore("SIGNATURE_PROFILES_DIR", saved.profiles);
});

function restore(name: string, value: string | undefined) {
  if (value === undefined) delete process.env[name];
  else process.env[name] = value;
}

function json(method: string, body: unknown) {
  return new Request("http://localhost/api", {
    method,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

function bare(method: string) {
  return new Request("http://localhost/api", { method });
}

const params = (name: string) => ({ params: Promise.resolve({ name }) });

describe("POST /api/signature", () => {
  it("returns the PNG as a download", async () => {
    const res = await signature.POST(json("POST", johnDoe));

    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toBe("image/png");
    expect(res.headers.get("Content-Disposition")).toBe('attachment; filename="email_signature.png"');

    const png = Buffer.from(await res.arrayBuffer());
    expect(png.subarray(1, 4).toString("ascii")).toBe("PNG");
    expect(pngSize(png).width).toBeGreaterThan(30);
  });

  it("reports every invalid field at once", async () => {
    const res = await signature.POST(json("POST", { ...johnDoe, name: " ", email: "john.example.com" }));

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      status: "error",
      message: "Invalid input",
      fields: {
        name: "Name is required and cannot be empty",
        email: 'Email is missing the "@" symbol (e.g. user@example.com)',
      },
    });
  });

  it("only embeds logos from the configured search paths", async () => {
    const logoPath = path.join(dir, "brand.png");
    await fs.writeFile(logoPath, createCanvas(20, 10).toBuffer("image/png"));

    const refused = await signature.POST(json("POST", { ...johnDoe, logoPath }));
    expect(refused.status).toBe(422);
    expect(await refused.json()).toMatchObject({
      fields: {
        logoPath: "Logo must be one of the configured logo files: logo.png, logo.jpg, logo/logo.png, logo/logo.jpg",
      },
    });

    await fs.writeFile(
      path.join(dir, "signature.config.json"),
      JSON.stringify({ confidentialityText: "Confidential.", logoSearchPaths: [logoPath] })
    );
    const accepted = await signature.POST(json("POST", { ...johnDoe, logoPath }));
    expect(accepted.status).toBe(200);
    expect(pngSize(Buffer.from(await accepted.arrayBuffer())).height).toBeGreaterThanOrEqual(100);
  });

  it("rejects a body that is not JSON", async () => {
    const res = await signature.POST(
      new Request("http://localhost/api", { method: "POST", body: "name=John" })
    );
    expect(res.status).toBe(400);
  });
});

describe("/api/profiles", () => {
  it("saves, lists, loads and deletes a profile", async () => {
    const created = await profiles.POST(json("POST", { profileName: " Work ", fields: johnDoe }));
    expect(created.status).toBe(201);
    expect(await created.json()).toEqual({ status: "ok", profileName: "Work" });

    expect(await (await profiles.GET()).json()).toEqual({ profiles: ["Work"] });

    const loaded = await profileItem.GET(bare("GET"), params("Work"));
    expect(loaded.status).toBe(200);
    expect(await loaded.json()).toMatchObject({ profile: { profileName: "Work", name: "John Doe" } });

    const deleted = await profileItem.DELETE(bare("DELETE"), params("Work"));
    expect(deleted.status).toBe(200);
    expect(await (await profiles.GET()).json()).toEqual({ profiles: [] });
  });

  it("answers 404 for an unknown profile", async () => {
    const res = await profileItem.GET(bare("GET"), params("Ghost"));
    expect(res.status).toBe(404);
  });

  it("validates the profile name with the fields", async () => {
    const res = await profiles.POST(json("POST", { profileName: "a/b", fields: johnDoe }));

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({
      fields: { profileName: 'Profile name must not contain / \\ : * ? " < > |' },
    });
  });
});

describe("/api/settings", () => {
  it("returns the merged configuration", async () => {
    const body = await (await settings.GET()).json();
    expect(body.config.confidentialityText).toBe("Confidential.");
    expect(body.config.margin).toBe(15);
  });

  it("saves a valid patch and rejects an invalid one", async () => {
    const ok = await settings.PUT(json("PUT", { margin: 20 }));
    expect(ok.status).toBe(200);

    const file = path.join(dir, "signature.config.json");
    expect(JSON.parse(await fs.readFile(file, "utf8")).margin).toBe(20);

    const order = ["logo", "email", "name", "position", "address", "phone", "mobile", "website", "separator", "confidentiality"];
    const reordered = await settings.PUT(json("PUT", { elementOrder: order }));
    expect(reordered.status).toBe(200);
    expect(JSON.parse(await fs.readFile(file, "utf8")).elementOrder).toEqual(order);

    const bad = await settings.PUT(json("PUT", { margin: -1 }));
    expect(bad.status).toBe(400);
    expect((await bad.json()).issues[0]).toMatch(/^margin: /);
  });
});
