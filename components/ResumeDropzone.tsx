"use client";

import React, { useState } from "react";
import { Upload, FileText, X } from "lucide-react";
import { toast } from "@/lib/toast";
import { looksLikePdf } from "@/lib/utils";

interface ResumeDropzoneProps {
  file: File | null;
  onChange: (file: File | null) => void;
  disabled?: boolean;
}

const ResumeDropzone = ({ file, onChange, disabled }: ResumeDropzoneProps) => {
  const [isDragOver, setIsDragOver] = useState(false);

  const accept = (candidate: File) => {
    if (!looksLikePdf(candidate)) {
      toast.error("Please upload a PDF file");
      return;
    }
    onChange(candidate);
  };

  const handleDrop = (e: React.DragEvent) => {
    e.preventDefault();
    setIsDragOver(false);
    if (disabled) return;

    const files = e.dataTransfer.files;
    if (files.length > 0) {
      accept(files[0]);
    }
  };

  if (file) {
    return (
      <div className="border-2 border-green-200 bg-green-50 rounded-lg p-4">
        <div className="flex items-center justify-between">
          <div className="flex items-center space-x-3">
            <FileText className="h-8 w-8 text-green-600" />
            <div>
              <p className="font-medium text-green-900">{file.name}</p>
              <p className="text-sm text-green-700">
                {(file.size / 1024).toFixed(1)} KB
              </p>
            </div>
          </div>
          <button
            type="button"
            onClick={() => onChange(null)}
            disabled={disabled}
            aria-label="Remove resume"
            className="p-1 hover:bg-green-200 rounded-full transition-colors"
          >
            <X className="h-5 w-5 text-green-600" />
          </button>
        </div>
      </div>
    );
  }

  return (
    <div
      className={`border-2 border-dashed rounded-lg p-8 text-center transition-colors ${
        isDragOver
          ? "border-blue-500 bg-blue-50"
          : "border-gray-300 hover:border-gray-400"
      }`}
      onDrop={handleDrop}
      onDragOver={(e) => {
        e.preventDefault();
        setIsDragOver(true);
      }}
      onDragLeave={(e) => {
        e.preventDefault();
        setIsDragOver(false);
      }}
    >
      <Upload className="mx-auto h-12 w-12 text-gray-400 mb-4" />
      <p className="text-lg font-medium text-gray-900 mb-2">
        Drop your resume here or click to browse
      </p>
      <p className="text-gray-500 mb-4">PDF only</p>
      <input
        type="file"
        accept=".pdf,application/pdf"
        onChange={(e) => {
          const picked = e.target.files?.[0];
          if (picked) accept(picked);
          e.target.value = "";
        }}
        disabled={disabled}
        className="hidden"
        id="resume-upload"
      />
      <label
        htmlFor="resume-upload"
        className="inline-flex items-center px-4 py-2 bg-gradient-to-r from-orange-500 to-red-500 hover:from-orange-600 hover:to-red-600 text-white rounded-lg cursor-pointer transition-all duration-300 transform hover:scale-105"
      >
        Choose File
      </label>
    </div>
  );
};

export default ResumeDropzone;
