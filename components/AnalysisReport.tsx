import ReactMarkdown from "react-markdown";
import remarkGfm from "remark-gfm";

interface AnalysisReportProps {
  markdown: string;
}

// Rendered exactly as the model returned it; only styling is added.
const AnalysisReport = ({ markdown }: AnalysisReportProps) => (
  <article className="space-y-3 text-gray-800 leading-relaxed">
    <ReactMarkdown
      remarkPlugins={[remarkGfm]}
      components={{
        strong: ({ children }) => (
          <strong className="font-bold text-gray-900">{children}</strong>
        ),
        h2: ({ children }) => (
          <h2 className="text-xl font-bold text-gray-900 mt-6 mb-2">{children}</h2>
        ),
        h3: ({ children }) => (
          <h3 className="text-base font-bold text-gray-900 mt-4 mb-2 pb-1 border-b border-gray-200">
            {children}
          </h3>
        ),
        ul: ({ children }) => <ul className="list-disc pl-6 space-y-1">{children}</ul>,
        ol: ({ children }) => <ol className="list-decimal pl-6 space-y-1">{children}</ol>,
      }}
    >
      {markdown}
    </ReactMarkdown>
  </article>
);

export default AnalysisReport;
