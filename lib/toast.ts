import { toast as sonnerToast } from "sonner";

// Banner-style notifications for each pipeline step
export const toast = {
    success: (message: string) => {
        sonnerToast.success(message);
    },

    error: (message: string) => {
        sonnerToast.error(message);
    },

    warning: (message: string, description?: string) => {
        sonnerToast.warning(message, description ? { description } : undefined);
    },
};
