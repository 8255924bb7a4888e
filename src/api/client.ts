import axios from "axios";
import { config } from "@/config";

export const apiClient = axios.create({
  baseURL: config.marketDataUrl,
  timeout: config.requestTimeoutMs,
  headers: {
    Accept: "application/json",
  },
});
