export { apiClient } from "./client";
export { marketDataApi, parseChartResult } from "./marketData";
