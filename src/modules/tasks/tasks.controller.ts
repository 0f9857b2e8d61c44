import { Controller, Get, Post, Body, Param, Res, HttpCode, HttpStatus } from '@nestjs/common';
import { FastifyReply } from 'fastify';
import { TasksService } from './tasks.service';
import { CreateTaskDto, CreateTaskResponseDto } from './dto/create-task.dto';
import {
  CancelTaskResponseDto,
  TaskResultResponseDto,
  TaskStatusResponseDto,
} from './dto/task.dto';

@Controller('tasks')
export class TasksController {
  constructor(private readonly tasksService: TasksService) {}

  /**
   * POST /api/tasks
   * 创建任务
   */
  @Post()
  async createTask(@Body() dto: CreateTaskDto): Promise<CreateTaskResponseDto> {
    return this.tasksService.createTask(dto);
  }

  /**
   * GET /api/tasks/:id
   * 获取任务状态
   */
  @Get(':id')
  async getStatus(@Param('id') id: string): Promise<TaskStatusResponseDto> {
    return this.tasksService.getStatus(id);
  }

  /**
   * GET /api/tasks/:id/result
   * 获取字幕结果
   */
  @Get(':id/result')
  async getResult(@Param('id') id: string): Promise<TaskResultResponseDto> {
    return this.tasksService.getResult(id);
  }

  /**
   * GET /api/tasks/:id/export/:format
   * 下载字幕文件（直接返回文件内容，不包装）
   */
  @Get(':id/export/:format')
  async exportTranscript(
    @Param('id') id: string,
    @Param('format') format: string,
    @Res() reply: FastifyReply,
  ): Promise<void> {
    const file = await this.tasksService.exportTranscript(id, format);
    await reply
      .header('Content-Type', file.content_type)
      .header('Content-Disposition', `attachment; filename="${file.filename}"`)
      .send(file.content);
  }

  /**
   * POST /api/tasks/:id/cancel
   * 取消任务
   */
  @Post(':id/cancel')
  @HttpCode(HttpStatus.ACCEPTED)
  async cancelTask(@Param('id') id: string): Promise<CancelTaskResponseDto> {
    return this.tasksService.cancelTask(id);
  }
}
