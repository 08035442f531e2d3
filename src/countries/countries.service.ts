import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';

import { AppConfig } from '../config/configuration';
import { countriesSchema, CountryRecord } from './country.schema';

@Injectable()
export class CountriesService {
  private readonly logger = new Logger(CountriesService.name);
  private countries: readonly CountryRecord[] = [];

  constructor(private readonly config: ConfigService<AppConfig, true>) {
    this.loadCountries();
  }

  private loadCountries() {
    const countriesPath = this.config.get('countriesPath', { infer: true });
    this.logger.debug(`Loading countries from ${countriesPath}`);

    try {
      const rawData: unknown = JSON.parse(fs.readFileSync(countriesPath, 'utf-8'));
      const result = countriesSchema.safeParse(rawData);
      if (!result.success) {
        const issue = result.error.issues[0];
        this.logger.error(
          `Invalid country data at ${issue.path.join('.')}: ${issue.message}`,
        );
        return;
      }
      this.countries = result.data;
      this.logger.log(`Loaded ${this.countries.length} countries`);
    } catch (error) {
      this.logger.error(
        `Could not read ${countriesPath}`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }

  getCountries(): readonly CountryRecord[] {
    return this.countries;
  }
}
