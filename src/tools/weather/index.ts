// ============================================================================
// Weather Domain Tools
// ============================================================================

import { ToolDescriptor } from '../types.js';
import { defineTool, numeric, toolError, toolSuccess } from '../shared/index.js';
import { isToolFault } from '../../errors.js';
import { PKG } from '../../config.js';
import type { Config } from '../../config.js';
import { observe } from '../weather.js';

export type WeatherToolConfig = Pick<Config, 'weatherApiUrl' | 'requestTimeoutMs'>;

export function weatherTools(config: WeatherToolConfig): ToolDescriptor[] {
  const currentWeatherTool = defineTool({
    name: 'get_weather',
    title: 'Current Weather',
    description:
      'Get current weather conditions (temperature, wind speed and direction, WMO weather code) for a location.',
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      openWorldHint: true,
    },
    params: {
      latitude: numeric().describe('Latitude in decimal degrees'),
      longitude: numeric().describe('Longitude in decimal degrees'),
    },
    handler: async (args, ctx) => {
      const result = await observe(args, {
        apiUrl: config.weatherApiUrl,
        timeoutMs: config.requestTimeoutMs,
        userAgent: `${PKG.name}/${PKG.version}`,
        signal: ctx.signal,
      });
      return isToolFault(result) ? toolError(result) : toolSuccess(result);
    },
  });

  return [currentWeatherTool];
}
