import { motion } from "framer-motion";
import type { Readiness } from "@/lib/session";

interface ReadinessBadgeProps {
  readiness: Readiness;
}

const STYLES: Record<Readiness, { text: string; className: string }> = {
  READY: {
    text: "Ready to analyze",
    className: "bg-green-100 border-green-200 text-green-700",
  },
  PARSED: {
    text: "Parsed, not validated",
    className: "bg-yellow-50 border-yellow-100 text-yellow-700",
  },
  EMPTY: {
    text: "Waiting for inputs",
    className: "bg-gray-50 border-gray-200 text-gray-600",
  },
};

const ReadinessBadge: React.FC<ReadinessBadgeProps> = ({ readiness }) => {
  const { text, className } = STYLES[readiness];

  return (
    <motion.div
      key={readiness}
      className={`inline-flex items-center px-3 py-1.5 rounded-full border ${className} shadow-sm`}
      initial={{ opacity: 0, scale: 0.8 }}
      animate={{ opacity: 1, scale: 1 }}
      transition={{ duration: 0.3 }}
    >
      <span className="text-xs font-semibold tracking-wide">{text}</span>
    </motion.div>
  );
};

export default ReadinessBadge;
