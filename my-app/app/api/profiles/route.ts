import { NextResponse } from "next/server";
import { z } from "zod";

import { createSignatureData, validateSignatureInput } from "@/signature/signatureData";
import { validateProfileName } from "@/signature/validators";
import {
  currentConfig,
  errorResponse,
  fieldErrorsResponse,
  profileStore,
  readJson,
  resolveFormLogo,
} from "../../../lib/server";

export const runtime = "nodejs";

const saveSchema = z.object({
  profileName: z.string(),
  fields: z.object({
    name: z.string().default(""),
    position: z.string().default(""),
    address: z.string().default(""),
    phone: z.string().default(""),
    mobile: z.string().default(""),
    email: z.string().default(""),
    website: z.string().default(""),
    logoPath: z.string().default(""),
  }),
});

export async function GET() {
  try {
    return NextResponse.json({ profiles: await profileStore().list() });
  } catch (err) {
    return errorResponse(err);
  }
}

export async function POST(req: Request) {
  const parsed = saveSchema.safeParse(await readJson(req));
  if (!parsed.success) {
    return NextResponse.json(
      { status: "error", message: "Invalid request", issues: parsed.error.flatten() },
      { status: 400 }
    );
  }

  const { profileName } = parsed.data;

  try {
    const logo = resolveFormLogo(parsed.data.fields.logoPath, currentConfig());
    const fields = { ...parsed.data.fields, logoPath: logo.ok ? logo.value : "" };

    const nameCheck = validateProfileName(profileName);
    const errors = validateSignatureInput(fields);
    if (!nameCheck.ok) errors.unshift(nameCheck.error);
    if (!logo.ok) errors.push(logo.error);
    if (errors.length) return fieldErrorsResponse(errors);

    await profileStore().save(profileName, createSignatureData(fields));
    return NextResponse.json({ status: "ok", profileName: profileName.trim() }, { status: 201 });
  } catch (err) {
    return errorResponse(err);
  }
}
