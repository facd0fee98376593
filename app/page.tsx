"use client";

import React, { useEffect, useReducer, useState } from "react";
import { useForm } from "react-hook-form";
import { zodResolver } from "@hookform/resolvers/zod";
import * as z from "zod";
import { motion, AnimatePresence } from "framer-motion";
import { AlertTriangle, CheckCircle2, XCircle } from "lucide-react";
import { Button } from "@/components/ui/button";
import { Textarea } from "@/components/ui/textarea";
import { Label } from "@/components/ui/label";
import ResumeDropzone from "@/components/ResumeDropzone";
import ReadinessBadge from "@/components/ReadinessBadge";
import AnalysisReport from "@/components/AnalysisReport";
import LoadingDots from "@/components/LoadingDots";
import { analyzeResume, fetchSession, parseResume, readinessAfterFailure } from "@/lib/api";
import { copilotReducer, initialCopilotState } from "@/lib/page-state";
import { toast } from "@/lib/toast";
import { debug } from "@/lib/debug";

const jobDescriptionSchema = z.object({
  jobDescription: z.string().trim().min(1, "Please paste the job description."),
});

type JobDescriptionForm = z.infer<typeof jobDescriptionSchema>;

type Banner = { tone: "error" | "warning" | "success"; message: string };

const BANNER_STYLES: Record<Banner["tone"], string> = {
  error: "border-red-200 bg-red-50 text-red-700",
  warning: "border-yellow-200 bg-yellow-50 text-yellow-800",
  success: "border-green-200 bg-green-50 text-green-700",
};

const BannerIcon = ({ tone }: { tone: Banner["tone"] }) => {
  if (tone === "error") return <XCircle className="h-5 w-5 shrink-0" />;
  if (tone === "warning") return <AlertTriangle className="h-5 w-5 shrink-0" />;
  return <CheckCircle2 className="h-5 w-5 shrink-0" />;
};

const CopilotPage = () => {
  const [resumeFile, setResumeFile] = useState<File | null>(null);
  const [banners, setBanners] = useState<Banner[]>([]);
  const [{ parsed, readiness, isParsing, isAnalyzing, report, analysisError }, dispatch] = useReducer(
    copilotReducer,
    initialCopilotState
  );

  const {
    register,
    handleSubmit,
    watch,
    formState: { errors },
  } = useForm<JobDescriptionForm>({
    resolver: zodResolver(jobDescriptionSchema),
    defaultValues: { jobDescription: "" },
  });

  const jobDescription = watch("jobDescription");
  const busy = isParsing || isAnalyzing;

  // A reload keeps the server-side session; pick its readiness back up.
  useEffect(() => {
    let cancelled = false;
    fetchSession()
      .then((session) => {
        if (!cancelled) dispatch({ type: "session-restored", readiness: session.readiness });
      })
      .catch((error) => debug("Session lookup failed:", error));
    return () => {
      cancelled = true;
    };
  }, []);

  const onParse = async (data: JobDescriptionForm) => {
    if (!resumeFile) {
      setBanners([{ tone: "error", message: "Please upload a PDF resume first." }]);
      toast.error("Please upload a PDF resume first.");
      return;
    }

    dispatch({ type: "parse-started" });
    setBanners([]);
    try {
      const result = await parseResume(resumeFile, data.jobDescription);
      debug("✅ Parse response:", result);

      const next: Banner[] = [];
      if (result.warnings.length > 0) {
        for (const w of result.warnings) {
          next.push({ tone: "warning", message: w.message });
          toast.warning("Very little text extracted", w.message);
        }
      } else {
        next.push({ tone: "success", message: "Resume parsed successfully ✅" });
        toast.success("Resume parsed successfully");
      }

      if (result.verdict.isValid) {
        next.push({ tone: "success", message: `Job description looks valid: ${result.verdict.reason}` });
      } else {
        next.push({
          tone: "error",
          message: `This doesn't look like a job description (${result.verdict.reason}). Paste the full posting and parse again.`,
        });
        toast.error("Job description didn't pass validation");
      }

      setBanners(next);
      dispatch({ type: "parse-succeeded", result });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Resume parsing failed.";
      dispatch({ type: "parse-failed" });
      setBanners([{ tone: "error", message }]);
      toast.error(message);
    }
  };

  const onAnalyze = async () => {
    dispatch({ type: "analyze-started" });
    try {
      const result = await analyzeResume();
      dispatch({ type: "analyze-succeeded", markdown: result.markdown });
      toast.success("Analysis complete");
    } catch (error) {
      const message = error instanceof Error ? error.message : "AI analysis failed.";
      dispatch({ type: "analyze-failed", message, readiness: await readinessAfterFailure(error) });
      toast.error(message);
    }
  };

  const ready = readiness === "READY";

  return (
    <div className="min-h-screen py-8 px-4">
      <div className="max-w-4xl mx-auto space-y-8">
        <div className="text-center">
          <h1 className="text-4xl md:text-5xl font-bold text-gray-900 mb-2">
            🧭 AI Career Copilot
          </h1>
          <p className="text-xl text-gray-600 max-w-3xl mx-auto">
            Upload your <strong>resume (PDF)</strong> and paste a{" "}
            <strong>job description</strong>. We&apos;ll analyze fit in the next step.
          </p>
        </div>

        <div className="bg-white rounded-2xl shadow-xl p-6 md:p-8">
          <form onSubmit={handleSubmit(onParse)} className="space-y-8" id="parse-form">
            <div className="space-y-2">
              <Label>Resume (PDF only)</Label>
              <ResumeDropzone file={resumeFile} onChange={setResumeFile} disabled={busy} />
            </div>

            <div className="space-y-2">
              <Label htmlFor="jobDescription">Job Description</Label>
              <Textarea
                id="jobDescription"
                placeholder="Paste the full JD here..."
                {...register("jobDescription")}
                className="min-h-56 resize-vertical"
                disabled={busy}
              />
              {errors.jobDescription && (
                <p className="text-red-500 text-sm">{errors.jobDescription.message}</p>
              )}
            </div>

            <details className="rounded-lg border border-gray-200 p-4 text-sm text-gray-700">
              <summary className="cursor-pointer font-medium">
                What did you provide? (quick preview)
              </summary>
              <p className="mt-2">Resume file: {resumeFile ? resumeFile.name : "None uploaded yet"}</p>
              <p>Job description length: {jobDescription.trim().length} characters</p>
            </details>

            <Button type="submit" disabled={busy} className="w-full h-14 text-lg">
              {isParsing ? "Reading your resume PDF…" : "Continue → Parse Resume"}
            </Button>
          </form>

          <AnimatePresence>
            {banners.length > 0 && (
              <motion.div
                initial={{ opacity: 0, y: 10 }}
                animate={{ opacity: 1, y: 0 }}
                exit={{ opacity: 0 }}
                className="mt-6 space-y-3"
              >
                {banners.map((b, i) => (
                  <div
                    key={`${b.tone}-${i}`}
                    className={`flex items-start gap-3 rounded-lg border p-3 text-sm ${BANNER_STYLES[b.tone]}`}
                  >
                    <BannerIcon tone={b.tone} />
                    <span>{b.message}</span>
                  </div>
                ))}
              </motion.div>
            )}
          </AnimatePresence>

          {parsed && (
            <details className="mt-6 rounded-lg border border-gray-200 p-4">
              <summary className="cursor-pointer font-medium text-gray-800">
                Preview parsed resume text ({parsed.resume.characters} characters, {parsed.resume.pages} pages)
              </summary>
              <pre className="mt-3 whitespace-pre-wrap text-sm text-gray-700 font-sans">
                {parsed.resume.preview}
              </pre>
            </details>
          )}
        </div>

        <section className="bg-white rounded-2xl shadow-xl p-6 md:p-8 space-y-4">
          <div className="flex items-center justify-between">
            <h2 className="text-2xl font-bold text-gray-900">AI Analysis</h2>
            <ReadinessBadge readiness={readiness} />
          </div>

          {!ready && (
            <p className="text-sm text-gray-500">
              Upload a PDF, paste the job description, and click{" "}
              <strong>Continue → Parse Resume</strong> to enable this.
            </p>
          )}

          <Button onClick={onAnalyze} disabled={!ready || busy} className="w-full h-12">
            {isAnalyzing ? "Analyzing resume vs job description…" : "Analyze with AI"}
          </Button>

          {isAnalyzing && <LoadingDots label="AI is working on your report…" />}

          {analysisError && (
            <div className={`flex items-start gap-3 rounded-lg border p-3 text-sm ${BANNER_STYLES.error}`}>
              <BannerIcon tone="error" />
              <span>{analysisError}</span>
            </div>
          )}

          {report && !isAnalyzing && <AnalysisReport markdown={report} />}
        </section>
      </div>
    </div>
  );
};

export default CopilotPage;
