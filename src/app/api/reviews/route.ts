import { NextResponse } from "next/server";
import {
  methodNotAllowedResponse,
  readFindingsPayload,
} from "@/lib/http/sessionResponses";
import { ReviewSession } from "@/lib/review/reviewSession";
import { getDefaultExpiryMs, saveSession } from "@/lib/store/sessionStore";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  return methodNotAllowedResponse(
    "POST, OPTIONS",
    "Use POST /api/reviews with a findings payload.",
  );
}

export async function OPTIONS() {
  return new NextResponse(null, {
    status: 204,
    headers: {
      Allow: "POST, OPTIONS",
      "Access-Control-Allow-Methods": "POST, OPTIONS",
      "Access-Control-Allow-Headers": "Content-Type",
    },
  });
}

export async function POST(request: Request) {
  try {
    const body = await readFindingsPayload(request);
    if (!body.ok) {
      return body.response;
    }

    const sessionId = crypto.randomUUID();
    const expiresAtMs = getDefaultExpiryMs();
    const session = new ReviewSession(body.payload);
    saveSession(sessionId, session, expiresAtMs);

    return NextResponse.json(
      {
        sessionId,
        expiresAt: new Date(expiresAtMs).toISOString(),
        snapshot: session.snapshot(),
      },
      { status: 201 },
    );
  } catch (error) {
    console.error("Failed to start review session", error);
    return NextResponse.json(
      { error: "Unable to start the review session." },
      { status: 500 },
    );
  }
}
