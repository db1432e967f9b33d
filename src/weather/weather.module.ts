import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { WeatherService } from './weather.service';
import { WeatherToolService } from './weather-tool.service';

@Module({
  imports: [HttpModule],
  providers: [WeatherService, WeatherToolService],
  exports: [WeatherService, WeatherToolService],
})
export class WeatherModule {}
