import { NextResponse } from "next/server";

import { saveSignatureConfig, updateSignatureConfig } from "@/signature/signatureConfig";
import { configPath, currentConfig, errorResponse, readJson } from "../../../lib/server";

export const runtime = "nodejs";

export async function GET() {
  try {
    return NextResponse.json({ config: currentConfig() });
  } catch (err) {
    return errorResponse(err);
  }
}

/** Body: a partial configuration merged over the current one. */
export async function PUT(req: Request) {
  try {
    const next = updateSignatureConfig(currentConfig(), await readJson(req));
    saveSignatureConfig(next, configPath());
    return NextResponse.json({ config: next });
  } catch (err) {
    return errorResponse(err);
  }
}
