"use client";
import { motion } from "framer-motion";

interface LoadingDotsProps {
  label?: string;
}

const LoadingDots = ({ label }: LoadingDotsProps) => {
  return (
    <div className="flex items-center gap-3" role="status">
      <motion.div className="flex space-x-1">
        {[0, 1, 2].map((i) => (
          <motion.div
            key={i}
            className="w-2 h-2 bg-orange-500 rounded-full"
            animate={{ scale: [1, 1.5, 1], opacity: [0.5, 1, 0.5] }}
            transition={{ duration: 1.5, repeat: Infinity, delay: i * 0.2 }}
          />
        ))}
      </motion.div>
      {label && <span className="text-sm text-gray-600">{label}</span>}
    </div>
  );
};

export default LoadingDots;
