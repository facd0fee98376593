// lib/pdf.ts (server-only)
import { extractText } from "unpdf";
import { ExtractionError, errorMessage } from "./errors";
import { logError } from "./debug";

export type ExtractedResume = {
    /** Page texts joined with "\n", in document order. */
    text: string;
    pages: number;
};

/** Per-page text of a PDF, in document order. */
export type PdfPageReader = (data: Uint8Array) => Promise<{ totalPages: number; text: string[] }>;

const readPages: PdfPageReader = (data) => extractText(data, { mergePages: false });

const PDF_MAGIC = "%PDF-";

/**
 * PDF bytes → plain text, one entry per page. Pages without a text layer
 * contribute "" so the newline count still tracks the page count.
 */
export async function extractResumeText(
    bytes: Uint8Array,
    reader: PdfPageReader = readPages
): Promise<ExtractedResume> {
    // pdf.js may transfer (detach) the buffer it is given
    const data = bytes.slice();

    const header = Buffer.from(data.subarray(0, 1024)).toString("latin1");
    if (!header.includes(PDF_MAGIC)) {
        throw new ExtractionError("Could not read PDF: the file is not a PDF document.");
    }

    try {
        const { text, totalPages } = await reader(data);
        return { text: text.join("\n"), pages: totalPages };
    } catch (error) {
        logError("PDF extraction error:", error);
        throw new ExtractionError(`Could not read PDF: ${errorMessage(error)}`, error);
    }
}
