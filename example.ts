// example.ts
import path from "node:path";
import { fileURLToPath } from "node:url";

import { generateToFile } from "./signature/generate.ts";
import { loadSignatureConfig } from "./signature/signatureConfig.ts";
import { createSignatureData } from "./signature/signatureData.ts";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Resolve files relative to this script's directory
const outputPath = path.join(__dirname, "output.png");

export const sampleSignature = {
  name: "John Doe",
  position: "Software Engineer",
  address: "Anytown, USA",
  phone: "+1 555 0100",
  mobile: "+1 555 0101",
  email: "john.doe@example.com",
  website: "", // falls back to the configured default website
};

async function main() {
  const config = loadSignatureConfig({ cwd: __dirname });
  const data = createSignatureData(sampleSignature);

  const result = await generateToFile(data, config, outputPath);
  console.log("Wrote:", result.path, `${result.width}x${result.height}`);
}

if (process.argv[1] === __filename) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
