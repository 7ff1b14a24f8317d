import axios from "axios";

export type HttpResponse = { data: unknown };

/** Recorte do axios usado pelas integrações (fácil de trocar por um fake nos testes). */
export interface HttpClient {
  get(url: string): Promise<HttpResponse>;
  post(url: string, body: unknown): Promise<HttpResponse>;
}

export function createHttpClient(timeoutMs: number): HttpClient {
  const instance = axios.create({ timeout: timeoutMs });
  return {
    get: (url) => instance.get<unknown>(url),
    post: (url, body) => instance.post<unknown>(url, body),
  };
}
