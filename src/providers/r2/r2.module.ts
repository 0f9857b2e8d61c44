import { Module, Global } from '@nestjs/common';
import { R2Service } from './r2.service';
import { ARTIFACT_STORAGE } from '../../modules/pipeline/pipeline.interfaces';

@Global()
@Module({
  providers: [R2Service, { provide: ARTIFACT_STORAGE, useExisting: R2Service }],
  exports: [R2Service, ARTIFACT_STORAGE],
})
export class R2Module {}
