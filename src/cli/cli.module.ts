import { Module } from '@nestjs/common';
import { CoolestModule } from '../coolest/coolest.module';
import { CliService } from './cli.service';

@Module({
  imports: [CoolestModule],
  providers: [CliService],
  exports: [CliService],
})
export class CliModule {}
