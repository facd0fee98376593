import { clsx, type ClassValue } from "clsx";
import { twMerge } from "tailwind-merge";

export function cn(...inputs: ClassValue[]) {
    return twMerge(clsx(inputs));
}

export const looksLikePdf = (file: { name?: string; type?: string }) =>
    (file.type || "").toLowerCase().includes("pdf") || /\.pdf$/i.test(file.name || "");
