import { BrowserRouter, Routes, Route } from "react-router-dom";
import { PortfolioProvider } from "./context";
import { Layout } from "./components/layout/Layout";
import { ErrorBoundary } from "./components/common/ErrorBoundary";
import { PortfolioPage } from "./pages/PortfolioPage";
import { AnalysisPage } from "./pages/AnalysisPage";

export default function App() {
  return (
    <BrowserRouter>
      <PortfolioProvider>
        <Layout>
          <ErrorBoundary>
            <Routes>
              <Route path="/" element={<PortfolioPage />} />
              <Route path="/analysis" element={<AnalysisPage />} />
            </Routes>
          </ErrorBoundary>
        </Layout>
      </PortfolioProvider>
    </BrowserRouter>
  );
}
