type Fetchable = {
  fetch: (request: Request) => Response | Promise<Response>;
};

export type NodeRequest = {
  method?: string;
  protocol?: string;
  hostname?: string;
  url?: string;
  headers: Record<string, string | string[] | undefined>;
  body?: unknown;
};

export type NodeResponse = {
  status(code: number): unknown;
  json(body: unknown): unknown;
  send(body: string): unknown;
  setHeader?(name: string, value: string): unknown;
};

const toBody = (raw: unknown, headers: Headers): string | Uint8Array | undefined => {
  if (raw === undefined || raw === null) return undefined;
  if (typeof raw === "string" || raw instanceof Uint8Array) return raw;
  if (raw instanceof ArrayBuffer) return new Uint8Array(raw);
  if (!headers.has("content-type")) {
    headers.set("content-type", "application/json");
  }
  return JSON.stringify(raw);
};

/** Adapts the Express-style request of an HTTPS function to a fetch-style app. */
export const requestHandler = (app: Fetchable) => {
  return async (req: NodeRequest, res: NodeResponse): Promise<void> => {
    const method = String(req.method ?? "GET").toUpperCase();
    const protocol = req.protocol ?? "https";
    const host = req.headers.host;
    const hostname = req.hostname ?? (typeof host === "string" ? host : "localhost");
    const url = new URL(`${protocol}://${hostname}${req.url ?? ""}`);
    const headers = new Headers();
    Object.entries(req.headers).forEach(([key, value]) => {
      if (typeof value === "string") {
        headers.set(key, value);
        return;
      }
      if (Array.isArray(value)) {
        headers.set(key, value.join(","));
      }
    });

    const body = ["GET", "HEAD"].includes(method) ? undefined : toBody(req.body, headers);
    const honoRes = await app.fetch(new Request(url.toString(), { method, headers, body }));

    if (typeof res.setHeader === "function") {
      honoRes.headers.forEach((value, key) => {
        res.setHeader?.(key, value);
      });
    }

    res.status(honoRes.status);
    const contentType = honoRes.headers.get("content-type") ?? "";
    if (contentType.includes("application/json")) {
      res.json(await honoRes.json());
      return;
    }
    res.send(await honoRes.text());
  };
};
