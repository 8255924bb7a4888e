import type { AnalysisError } from "@/types";

interface ChartErrorShape {
  response?: { data?: { chart?: { error?: { description?: string } | null } } };
}

export function extractErrorMessage(err: unknown, fallback = "An unexpected error occurred"): string {
  const axiosErr = err as ChartErrorShape | null | undefined;
  return (
    axiosErr?.response?.data?.chart?.error?.description ||
    (err instanceof Error ? err.message : fallback)
  );
}

export function isInformational(error: AnalysisError): boolean {
  return error.kind === "empty-portfolio";
}
