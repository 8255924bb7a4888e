export { useAnalysis } from "./useAnalysis";
