import {
  createSignatureData,
  fieldValidators,
  type SignatureData,
  type SignatureField,
  type SignatureInput,
} from "./signatureData.ts";

/** Asks one question and resolves with the raw answer. */
export type Ask = (question: string) => Promise<string>;
export type Write = (line: string) => void;

type PromptSpec = { field: SignatureField; label: string; required: boolean };

export const PROMPTS: readonly PromptSpec[] = [
  { field: "name", label: "Name", required: true },
  { field: "position", label: "Position", required: true },
  { field: "address", label: "Address", required: true },
  { field: "email", label: "Email", required: true },
  { field: "phone", label: "Phone", required: false },
  { field: "mobile", label: "Mobile", required: false },
  { field: "website", label: "Website", required: false },
  { field: "logoPath", label: "Logo file", required: false },
];

export function printWelcome(write: Write) {
  write("=".repeat(60));
  write("Email Signature Generator");
  write("=".repeat(60));
  write("");
  write("Please provide your information to generate your email signature.");
  write("Required fields are marked with *");
  write("");
}

/**
 * Prompts for every field, re-asking a field until its validator accepts
 * the answer. Fields listed in `skip` are not asked.
 */
export async function collectSignatureData(
  ask: Ask,
  write: Write,
  options: { defaultWebsite: string; skip?: readonly SignatureField[] }
): Promise<SignatureData> {
  const input: SignatureInput = { name: "", position: "", address: "", email: "" };

  for (const prompt of PROMPTS) {
    if (options.skip?.includes(prompt.field)) continue;
    input[prompt.field] = await askField(ask, write, prompt, options.defaultWebsite);
  }

  return createSignatureData(input);
}

async function askField(ask: Ask, write: Write, prompt: PromptSpec, defaultWebsite: string) {
  let question = `${prompt.label}${prompt.required ? "*" : " (optional)"}: `;
  if (prompt.field === "website") {
    question = `Website (press Enter for default '${defaultWebsite}'): `;
  }

  for (;;) {
    const answer = (await ask(question)).trim();
    const result = fieldValidators[prompt.field](answer);
    if (result.ok) return result.value;

    write(`Error: ${result.error.reason}`);
    write("Please try again.");
    write("");
  }
}
