import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { HttpErrorFilter } from './filters/http-error.filter';
import { ApiEnabledGuard } from './guards/api-enabled.guard';

@Module({
  imports: [ConfigModule],
  providers: [ApiEnabledGuard, HttpErrorFilter],
  exports: [ApiEnabledGuard, HttpErrorFilter],
})
export class CommonModule {}
