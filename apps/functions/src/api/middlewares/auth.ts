import type { Context, MiddlewareHandler } from "hono";
import { z } from "zod";
import { SYSTEM_AUTHOR } from "@scriptorium/transcription";
import type { ApiBindings } from "../types.js";

export const unauthorizedError = () => new Error("UNAUTHORIZED");

const tokenBodySchema = z.object({ token: z.string().min(1) });

const parseJson = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
};

// Beacon requests carry no headers; their token comes in the body.
const readBodyToken = async (c: Context<ApiBindings>): Promise<string | null> => {
  const raw = await c.req.text();
  const parsed = tokenBodySchema.safeParse(parseJson(raw));
  return parsed.success ? `Bearer ${parsed.data.token}` : null;
};

export type AuthMiddlewareOptions = {
  /** POST paths that may carry the token in the body instead of a header. */
  bodyTokenPath?: RegExp;
};

export const createAuthMiddleware = (options: AuthMiddlewareOptions = {}): MiddlewareHandler<ApiBindings> => {
  return async (c, next) => {
    if (c.req.method === "OPTIONS") return next();
    const deps = c.get("deps");
    let header = c.req.header("Authorization");
    if (!header && c.req.method === "POST" && options.bodyTokenPath?.test(c.req.path)) {
      header = (await readBodyToken(c)) ?? undefined;
    }
    const auth = await deps.getAuthUser(header);
    // The system author id is reserved for generated versions.
    if (auth.uid === SYSTEM_AUTHOR.toString()) throw unauthorizedError();
    c.set("auth", auth);
    await next();
  };
};
