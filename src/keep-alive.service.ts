import { Inject, Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigType } from '@nestjs/config';
import { Interval } from '@nestjs/schedule';
import { firstValueFrom } from 'rxjs';
import { appConfig } from './config/configuration';

const KEEP_ALIVE_INTERVAL_MS = 10 * 60 * 1000;

/** Pings the public URL so free hosting tiers don't put the bot to sleep. */
@Injectable()
export class KeepAliveService {
  private readonly logger = new Logger(KeepAliveService.name);

  constructor(
    private readonly httpService: HttpService,
    @Inject(appConfig.KEY)
    private readonly config: ConfigType<typeof appConfig>,
  ) {}

  @Interval(KEEP_ALIVE_INTERVAL_MS)
  async ping(): Promise<void> {
    const url = this.config.keepAliveUrl;
    if (!url) return;

    try {
      const res = await firstValueFrom(this.httpService.get<unknown>(url));
      this.logger.log(`Ping succeeded with status ${res.status}`);
    } catch (error) {
      this.logger.error(
        `Ping failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
