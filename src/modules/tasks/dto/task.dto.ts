import {
  ArtifactResult,
  OutputFormat,
  Segment,
  TaskError,
  TaskFlags,
  TaskStatus,
} from '../../../database/entities';

export interface TaskStatusResponseDto {
  task_id: string;
  status: TaskStatus;
  flags: TaskFlags;
  error: TaskError | null;
  cancel_requested: boolean;
  language: string | null;
  duration_sec: number | null;
  retry_after?: number;
  created_at: string;
  updated_at: string;
}

export interface TaskResultResponseDto {
  task_id: string;
  language: string | null;
  duration_sec: number | null;
  /** 出现过的说话人，按字典序 */
  speakers: string[];
  segments: Segment[];
  flags: TaskFlags;
  artifacts: Partial<Record<OutputFormat, ArtifactResult>>;
}

export interface ExportResponseDto {
  format: OutputFormat;
  filename: string;
  content_type: string;
  content: string;
}

export interface CancelTaskResponseDto {
  task_id: string;
  status: TaskStatus;
  cancel_requested: boolean;
}
