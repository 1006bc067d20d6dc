import { z } from "zod";

export const uploadRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  published_at: z.string(),
  description: z.string().default("")
});

export const uploadRecordListSchema = z.array(uploadRecordSchema);

export const monitorStateSchema = z.object({
  seen_ids: z.array(z.string()).default([]),
  last_check: z.string().nullable().default(null)
});

export const episodeSchema = z.object({
  video_id: z.string().min(1),
  title: z.string(),
  description: z.string().default(""),
  published_at: z.string(),
  audio_url: z.string().nullable(), // null when upload failed or was skipped
  file_size: z.number().int().nonnegative().default(0),
  processed_at: z.string()
});

export const episodeCatalogSchema = z.array(episodeSchema);

/** One upload reported by discovery, as written to new_videos.json */
export type UploadRecord = z.infer<typeof uploadRecordSchema>;

export type MonitorState = z.infer<typeof monitorStateSchema>;

export type Episode = z.infer<typeof episodeSchema>;

export interface CaseInfo {
  case_name: string;
  docket: string | null;
}
