import { z } from "zod";

const AssignedPanelFiles = z.object({
  panelLabel: z
    .string()
    .describe("Panel label the files belong to, e.g. 'A' or 'ii'"),
  panelFiles: z
    .array(z.string())
    .describe("Archive paths of the source-data files assigned to this panel"),
});

export const AssignedFilesSchema = z.object({
  assignedFiles: z
    .array(AssignedPanelFiles)
    .describe("Panels and the source-data files assigned to each of them"),
  notAssignedFiles: z
    .array(z.string())
    .describe("Files from the list that could not be assigned to any panel"),
});

export type AssignedPanelFiles = z.infer<typeof AssignedPanelFiles>;
export type AssignedFilesList = z.infer<typeof AssignedFilesSchema>;
