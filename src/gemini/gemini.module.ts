import { Module } from '@nestjs/common';
import { WeatherModule } from '../weather/weather.module';
import { GeminiService } from './gemini.service';

@Module({
  imports: [WeatherModule],
  providers: [GeminiService],
  exports: [GeminiService],
})
export class GeminiModule {}
