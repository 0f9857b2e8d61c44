import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsBoolean,
  IsEnum,
  IsInt,
  IsArray,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { OutputFormat, TaskStatus } from '../../../database/entities';

export class DiarizationOptionsDto {
  @IsBoolean()
  @IsOptional()
  enabled?: boolean;

  @IsInt()
  @Min(1)
  @IsOptional()
  min_speakers?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  max_speakers?: number;
}

export class RefinementOptionsDto {
  @IsBoolean()
  @IsOptional()
  enabled?: boolean;

  // 按语义重新断句
  @IsBoolean()
  @IsOptional()
  semantic_segmentation?: boolean;

  // 修正识别错误
  @IsBoolean()
  @IsOptional()
  error_correction?: boolean;

  // 润色表达
  @IsBoolean()
  @IsOptional()
  expression_optimization?: boolean;

  // 翻译目标语言
  @IsString()
  @IsOptional()
  translate_to?: string;
}

export class CreateTaskDto {
  /** 音频来源：本地路径或 ffmpeg 可读取的 URL */
  @IsString()
  @IsNotEmpty()
  input_ref!: string;

  /** 音频语言；不填时自动检测 */
  @IsString()
  @IsOptional()
  language?: string;

  @IsArray()
  @IsEnum(OutputFormat, { each: true })
  @IsOptional()
  formats?: OutputFormat[];

  @IsBoolean()
  @IsOptional()
  speaker_labels?: boolean;

  @ValidateNested()
  @Type(() => DiarizationOptionsDto)
  @IsOptional()
  diarization?: DiarizationOptionsDto;

  @ValidateNested()
  @Type(() => RefinementOptionsDto)
  @IsOptional()
  refinement?: RefinementOptionsDto;
}

export interface CreateTaskResponseDto {
  task_id: string;
  status: TaskStatus;
  retry_after: number;
}
