import { NextResponse } from "next/server";
import { z } from "zod";

import { generate } from "@/signature/generate";
import { createSignatureData, validateSignatureInput } from "@/signature/signatureData";
import {
  currentConfig,
  errorResponse,
  fieldErrorsResponse,
  readJson,
  resolveFormLogo,
} from "../../../lib/server";

export const runtime = "nodejs"; // canvas + fs

const requestSchema = z.object({
  name: z.string().default(""),
  position: z.string().default(""),
  address: z.string().default(""),
  phone: z.string().default(""),
  mobile: z.string().default(""),
  email: z.string().default(""),
  website: z.string().default(""),
  logoPath: z.string().default(""),
});

export async function POST(req: Request) {
  const parsed = requestSchema.safeParse(await readJson(req));
  if (!parsed.success) {
    return NextResponse.json(
      { status: "error", message: "Invalid request", issues: parsed.error.flatten() },
      { status: 400 }
    );
  }

  try {
    const config = currentConfig();
    const logo = resolveFormLogo(parsed.data.logoPath, config);
    const input = { ...parsed.data, logoPath: logo.ok ? logo.value : "" };

    // report every bad field at once so the form can highlight them together
    const errors = validateSignatureInput(input);
    if (!logo.ok) errors.push(logo.error);
    if (errors.length) return fieldErrorsResponse(errors);

    const png = await generate(createSignatureData(input), config);

    return new NextResponse(new Uint8Array(png), {
      headers: {
        "Content-Type": "image/png",
        "Content-Disposition": 'attachment; filename="email_signature.png"',
      },
    });
  } catch (err) {
    return errorResponse(err);
  }
}
