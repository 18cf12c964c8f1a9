import { NextResponse } from "next/server";
import { loadConfig } from "@/lib/config";
import { countFindings, parseFindingsPayload } from "@/lib/review/parseFindings";
import type { ReviewSession } from "@/lib/review/reviewSession";
import { getStoredSessionState } from "@/lib/store/sessionStore";
import type { FindingsPayload } from "@/types/reconciliation";

export type RouteContext = { params: Promise<{ id: string }> };

type SessionLookup =
  | { ok: true; session: ReviewSession; expiresAtMs: number }
  | { ok: false; response: NextResponse };

export const resolveSession = (sessionId: string): SessionLookup => {
  const state = getStoredSessionState(sessionId);

  if (state.state === "expired") {
    return {
      ok: false,
      response: NextResponse.json(
        { error: "Review session expired; please start a new validation run." },
        { status: 410 },
      ),
    };
  }

  if (state.state === "missing") {
    return {
      ok: false,
      response: NextResponse.json(
        { error: "Review session not found or expired." },
        { status: 404 },
      ),
    };
  }

  return {
    ok: true,
    session: state.record.session,
    expiresAtMs: state.record.expiresAtMs,
  };
};

type BodyResult =
  | { ok: true; value: unknown }
  | { ok: false; response: NextResponse };

export const readJsonBody = async (request: Request): Promise<BodyResult> => {
  try {
    const value: unknown = await request.json();
    return { ok: true, value };
  } catch {
    return {
      ok: false,
      response: NextResponse.json(
        { error: "Request body must be valid JSON." },
        { status: 400 },
      ),
    };
  }
};

type PayloadResult =
  | { ok: true; payload: FindingsPayload }
  | { ok: false; response: NextResponse };

export const readFindingsPayload = async (request: Request): Promise<PayloadResult> => {
  const body = await readJsonBody(request);
  if (!body.ok) {
    return body;
  }

  const payload = parseFindingsPayload(body.value);
  const { maxFindings } = loadConfig();
  if (countFindings(payload) > maxFindings) {
    return {
      ok: false,
      response: NextResponse.json(
        { error: `Findings payload exceeds the limit of ${maxFindings} items.` },
        { status: 413 },
      ),
    };
  }

  return { ok: true, payload };
};

export const methodNotAllowedResponse = (allow: string, hint: string) =>
  NextResponse.json(
    { error: `Method not allowed. ${hint}` },
    {
      status: 405,
      headers: { Allow: allow },
    },
  );
