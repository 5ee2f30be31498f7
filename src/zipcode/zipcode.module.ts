import { Module } from '@nestjs/common';
import { ZipDatasetService } from './zip-dataset.service';
import { ZipRadiusService } from './zip-radius.service';

@Module({
  providers: [ZipDatasetService, ZipRadiusService],
  exports: [ZipDatasetService, ZipRadiusService],
})
export class ZipcodeModule {}
