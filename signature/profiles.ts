import fs from "node:fs/promises";
import path from "node:path";

import { describeError, FileSystemError, ProfileError } from "./errors.ts";
import { fromProfile, toProfile, type SignatureData } from "./signatureData.ts";
import { unwrap, validateProfileName } from "./validators.ts";

export const DEFAULT_PROFILES_DIR = "profiles";

/** One `<profileName>.json` file per profile inside `dir`. */
export class ProfileStore {
  readonly dir: string;

  constructor(dir: string = DEFAULT_PROFILES_DIR) {
    this.dir = path.resolve(dir);
  }

  async save(profileName: string, data: SignatureData): Promise<string> {
    const record = toProfile(profileName, data);
    const file = this.fileFor(record.profileName);

    try {
      await fs.mkdir(this.dir, { recursive: true });
      // write-then-rename so a crash never leaves half a profile behind
      const tmp = `${file}.${process.pid}.tmp`;
      await fs.writeFile(tmp, `${JSON.stringify(record, null, 2)}\n`, "utf8");
      await fs.rename(tmp, file);
    } catch (err) {
      throw new FileSystemError("save profile", file, err);
    }
    return file;
  }

  async load(profileName: string): Promise<SignatureData> {
    const name = unwrap(validateProfileName(profileName));
    const file = this.fileFor(name);

    let text: string;
    try {
      text = await fs.readFile(file, "utf8");
    } catch (err) {
      if (isNotFound(err)) throw await this.notFound(name);
      throw new FileSystemError("read profile", file, err);
    }

    let record: unknown;
    try {
      record = JSON.parse(text);
    } catch (err) {
      throw new ProfileError(name, `Profile '${name}' is not valid JSON: ${describeError(err)}`, {
        cause: err,
      });
    }
    return fromProfile(record);
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new FileSystemError("list profiles in", this.dir, err);
    }
    return entries
      .filter((entry) => entry.endsWith(".json"))
      .map((entry) => entry.slice(0, -".json".length))
      .sort((a, b) => a.localeCompare(b));
  }

  async delete(profileName: string): Promise<void> {
    const name = unwrap(validateProfileName(profileName));
    const file = this.fileFor(name);
    try {
      await fs.unlink(file);
    } catch (err) {
      if (isNotFound(err)) throw await this.notFound(name);
      throw new FileSystemError("delete profile", file, err);
    }
  }

  private fileFor(name: string) {
    return path.join(this.dir, `${name}.json`);
  }

  private async notFound(name: string) {
    const available = await this.list();
    return new ProfileError(
      name,
      `Profile '${name}' not found in ${this.dir}. Available profiles: ${available.join(", ") || "none"}`
    );
  }
}

function isNotFound(err: unknown) {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
