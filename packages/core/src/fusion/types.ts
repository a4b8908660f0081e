import type { ResourceType } from '../site/site';
import type { WeatherValues } from '../weather/types';

export interface PowerSample {
  timestamp: Date;
  /** Power level in kW */
  powerKw: number;
}

export interface FusedRecord extends WeatherValues {
  timestamp: Date;
  powerKw: number;
  resourceType: ResourceType;
  name: string;
  installedPower: number;
}
