// lib/page-state.ts - request state of the copilot page
import type { Readiness } from "./session";
import type { ParseResponse } from "./types";

export type CopilotState = {
    parsed: ParseResponse | null;
    readiness: Readiness;
    isParsing: boolean;
    isAnalyzing: boolean;
    report: string | null;
    analysisError: string | null;
};

export type CopilotAction =
    | { type: "session-restored"; readiness: Readiness }
    | { type: "parse-started" }
    | { type: "parse-succeeded"; result: ParseResponse }
    | { type: "parse-failed" }
    | { type: "analyze-started" }
    | { type: "analyze-succeeded"; markdown: string }
    | { type: "analyze-failed"; message: string; readiness?: Readiness | null };

export const initialCopilotState: CopilotState = {
    parsed: null,
    readiness: "EMPTY",
    isParsing: false,
    isAnalyzing: false,
    report: null,
    analysisError: null,
};

export function copilotReducer(state: CopilotState, action: CopilotAction): CopilotState {
    switch (action.type) {
        case "session-restored":
            return { ...state, readiness: action.readiness };
        case "parse-started":
            // a report belongs to the inputs it was made from
            return { ...state, isParsing: true, report: null, analysisError: null };
        case "parse-succeeded":
            return { ...state, isParsing: false, parsed: action.result, readiness: action.result.readiness };
        case "parse-failed":
            return { ...state, isParsing: false };
        case "analyze-started":
            return { ...state, isAnalyzing: true, analysisError: null };
        case "analyze-succeeded":
            return { ...state, isAnalyzing: false, report: action.markdown };
        case "analyze-failed":
            return {
                ...state,
                isAnalyzing: false,
                analysisError: action.message,
                readiness: action.readiness ?? state.readiness,
            };
    }
}
