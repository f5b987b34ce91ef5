import { NextResponse } from "next/server";
import type { NextRequest } from "next/server";
import { corsHeaders, corsOriginFromEnv } from "@/lib/http/cors";

export function middleware(request: NextRequest) {
  const headers = corsHeaders(corsOriginFromEnv());

  // Answer preflight here; route handlers only export GET
  if (request.method === "OPTIONS") {
    return new NextResponse(null, { status: 204, headers });
  }

  const response = NextResponse.next();
  for (const [key, value] of Object.entries(headers)) response.headers.set(key, value);
  return response;
}

export const config = {
  matcher: ["/games", "/game/:path*"],
};
