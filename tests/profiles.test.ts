import fs from "node:fs/promises";
import path from "node:path";
import { createCanvas } from "@napi-rs/canvas";
import { describe, expect, it } from "vitest";

import { ProfileError, ValidationError } from "../signature/errors.ts";
import { ProfileStore } from "../signature/profiles.ts";
import { createSignatureData } from "../signature/signatureData.ts";
import { johnDoe, tempDir } from "./helpers.ts";

describe("ProfileStore", () => {
  it("saves one JSON file per profile and loads it back", async () => {
    const store = new ProfileStore(await tempDir());
    const data = createSignatureData(johnDoe);

    const file = await store.save("Work", data);
    expect(file).toBe(path.join(store.dir, "Work.json"));

    const saved = await fs.readFile(file, "utf8");
    expect(saved.endsWith("}\n")).toBe(true);
    expect(JSON.parse(saved)).toMatchObject({ profileName: "Work", email: "john.doe@example.com" });

    expect(await store.load("Work")).toEqual(data);
  });

  it("overwrites an existing profile of the same name", async () => {
    const store = new ProfileStore(await tempDir());
    await store.save("Work", createSignatureData(johnDoe));
    await store.save("Work", createSignatureData({ ...johnDoe, position: "Architect" }));

    expect((await store.load("Work")).position).toBe("Architect");
    expect(await store.list()).toEqual(["Work"]);
  });

  it("lists profile names sorted and ignores other files", async () => {
    const store = new ProfileStore(await tempDir());
    await store.save("personal", createSignatureData(johnDoe));
    await store.save("Alpha", createSignatureData(johnDoe));
    await fs.writeFile(path.join(store.dir, "notes.txt"), "x");

    expect(await store.list()).toEqual(["Alpha", "personal"]);
  });

  it("lists nothing when the directory does not exist yet", async () => {
    const store = new ProfileStore(path.join(await tempDir(), "missing"));
    expect(await store.list()).toEqual([]);
  });

  it("names the available profiles when one is missing", async () => {
    const store = new ProfileStore(await tempDir());
    await store.save("Work", createSignatureData(johnDoe));

    await expect(store.load("Ghost")).rejects.toThrow(
      `Profile 'Ghost' not found in ${store.dir}. Available profiles: Work`
    );
    await expect(store.delete("Ghost")).rejects.toBeInstanceOf(ProfileError);
  });

  it("deletes a profile", async () => {
    const store = new ProfileStore(await tempDir());
    await store.save("Work", createSignatureData(johnDoe));
    await store.delete("Work");

    expect(await store.list()).toEqual([]);
  });

  it("still loads a profile whose logo file has gone", async () => {
    const dir = await tempDir();
    const logoPath = path.join(dir, "logo.png");
    await fs.writeFile(logoPath, createCanvas(4, 4).toBuffer("image/png"));

    const store = new ProfileStore(path.join(dir, "profiles"));
    await store.save("work", createSignatureData({ ...johnDoe, logoPath }));
    expect((await store.load("work")).logoPath).toBe(logoPath);

    await fs.rm(logoPath);
    const loaded = await store.load("work");

    expect(loaded.logoPath).toBeNull();
    expect(loaded).toEqual(createSignatureData(johnDoe));
  });

  it("rejects corrupt files and unsafe names", async () => {
    const store = new ProfileStore(await tempDir());
    await fs.writeFile(path.join(store.dir, "Broken.json"), "{ nope");

    await expect(store.load("Broken")).rejects.toThrow("Profile 'Broken' is not valid JSON");
    await expect(store.save("../escape", createSignatureData(johnDoe))).rejects.toBeInstanceOf(
      ValidationError
    );
  });
});
