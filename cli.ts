// cli.ts
import readline from "node:readline/promises";
import { Command } from "commander";

import { SignatureError } from "./signature/errors.ts";
import { findLogo, generateToFile } from "./signature/generate.ts";
import { ProfileStore, DEFAULT_PROFILES_DIR } from "./signature/profiles.ts";
import { collectSignatureData, printWelcome, type Ask } from "./signature/prompts.ts";
import { loadSignatureConfig } from "./signature/signatureConfig.ts";
import { createSignatureData, type SignatureData } from "./signature/signatureData.ts";

type GenerateOptions = {
  config?: string;
  output: string;
  profile?: string;
  saveProfile?: string;
  logo?: string;
  profilesDir: string;
};

export const program = new Command()
  .name("email-signature")
  .description("Render a personalized email signature as a transparent PNG")
  .version("0.1.0", "-v, --version", "Show version number")
  .option("--debug", "Enable debug output")
  .hook("preAction", (command) => {
    if (command.opts<{ debug?: boolean }>().debug) process.env.DEBUG = "1";
  });

program
  .command("generate", { isDefault: true })
  .description("Prompt for your details (or load a profile) and write the PNG")
  .option("-c, --config <path>", "Configuration file (JSON)")
  .option("-o, --output <path>", "Output PNG file", "email_signature.png")
  .option("-p, --profile <name>", "Load field values from a saved profile")
  .option("-s, --save-profile <name>", "Save the entered values as a profile")
  .option("-l, --logo <path>", "Logo image (PNG/JPG); searched for when omitted")
  .option("--profiles-dir <dir>", "Directory holding profiles", DEFAULT_PROFILES_DIR)
  .action(async (options: GenerateOptions) => {
    const config = loadSignatureConfig({ path: options.config });
    const store = new ProfileStore(options.profilesDir);

    let data: SignatureData;
    if (options.profile) {
      data = await store.load(options.profile);
      console.log(`Loaded profile '${options.profile}'`);
    } else {
      data = await promptForData(config.defaultWebsite, options.logo !== undefined);
    }

    data = withLogo(data, options.logo ?? data.logoPath ?? findLogo(config.logoSearchPaths));

    if (options.saveProfile) {
      const file = await store.save(options.saveProfile, data);
      console.log(`Saved profile '${options.saveProfile}' to ${file}`);
    }

    const result = await generateToFile(data, config, options.output);

    console.log("");
    console.log("=".repeat(60));
    console.log("Success!");
    console.log("=".repeat(60));
    console.log(`File: ${result.path}`);
    console.log(`Dimensions: ${result.width}x${result.height} pixels`);
  });

const profiles = program.command("profiles").description("Manage saved profiles");

profiles
  .command("list")
  .description("List saved profiles")
  .option("--profiles-dir <dir>", "Directory holding profiles", DEFAULT_PROFILES_DIR)
  .action(async (options: { profilesDir: string }) => {
    const names = await new ProfileStore(options.profilesDir).list();
    if (!names.length) {
      console.log("No saved profiles.");
      return;
    }
    for (const name of names) console.log(name);
  });

profiles
  .command("delete <name>")
  .description("Delete a saved profile")
  .option("--profiles-dir <dir>", "Directory holding profiles", DEFAULT_PROFILES_DIR)
  .action(async (name: string, options: { profilesDir: string }) => {
    await new ProfileStore(options.profilesDir).delete(name);
    console.log(`Deleted profile '${name}'`);
  });

async function promptForData(defaultWebsite: string, logoGiven: boolean): Promise<SignatureData> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const closed = new Promise<never>((_, reject) => {
    rl.once("close", () => reject(new SignatureError("Input closed before all fields were answered")));
  });
  // keep the rejection from surfacing when the interface closes normally
  closed.catch(() => undefined);

  const ask: Ask = (question) => Promise.race([rl.question(question), closed]);

  try {
    printWelcome((line) => console.log(line));
    return await collectSignatureData(ask, (line) => console.log(line), {
      defaultWebsite,
      skip: logoGiven ? ["logoPath"] : [],
    });
  } finally {
    rl.close();
  }
}

function withLogo(data: SignatureData, logoPath: string | null): SignatureData {
  if (!logoPath || logoPath === data.logoPath) return data;
  return createSignatureData({ ...data, logoPath });
}

program.parseAsync(process.argv).catch((err) => {
  if (err instanceof SignatureError) {
    console.error(`\nError: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
