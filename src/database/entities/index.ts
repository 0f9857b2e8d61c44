export * from './task.entity';
export * from './transcript.entity';
