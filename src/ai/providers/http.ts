// src/ai/providers/http.ts
import axios from "axios";
import type { HttpGet, HttpPost } from "./types";

export const axiosPost: HttpPost = (url, body, config) => axios.post(url, body, config);

export const axiosGet: HttpGet = (url, config) => axios.get(url, config);

export function describeHttpError(e: unknown): string {
  if (axios.isAxiosError(e)) {
    if (e.code === "ERR_CANCELED") return "request aborted";
    const status = e.response?.status;
    return status ? `HTTP ${status}: ${e.message}` : e.message;
  }
  return e instanceof Error ? e.message : String(e);
}
