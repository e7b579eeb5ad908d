import { JobQueue } from './JobQueue';

export const EXPORT_FIELDS = [
  'id',
  'email',
  'first_name',
  'last_name',
  'phone_number',
  'state',
] as const;

export type ExportField = (typeof EXPORT_FIELDS)[number];

export interface UserExportJob {
  adminId: string;
  fields: ExportField[];
  onlySubscribers: boolean;
}

export interface ImageProcessingJob {
  imageId: string;
}

/**
 * Payload type of every job the API runs in the background
 */
export type AppJobs = {
  user_export: UserExportJob;
  image_processing: ImageProcessingJob;
};

export type AppJobQueue = JobQueue<AppJobs>;
