export function basicAuthHeader(apiKey: string, apiSecret: string): string {
  const token = Buffer.from(`${apiKey}:${apiSecret}`, "utf8").toString("base64");
  return `Basic ${token}`;
}
