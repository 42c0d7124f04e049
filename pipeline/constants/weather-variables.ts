export const REGION_COLUMN = "Region";
export const TIMESTAMP_COLUMN = "Datetime";
export const WEATHER_CODE_COLUMN = "Weather code";
export const DAILY_WEATHER_CODE_COLUMN = "Daily weather code";

/**
 * Archive metric ids requested per window, mapped to the display column names
 * written to the consolidated dataset. Map order is column order.
 */
export const HOURLY_VARIABLES: Readonly<Record<string, string>> = {
  temperature_2m: "Temperature (°C)",
  relative_humidity_2m: "Relative humidity (%)",
  dew_point_2m: "Dew point (°C)",
  apparent_temperature: "Apparent temperature (°C)",
  pressure_msl: "Sea level pressure (hPa)",
  surface_pressure: "Surface pressure (hPa)",
  precipitation: "Precipitation (mm)",
  cloud_cover: "Cloud cover (%)",
  cloud_cover_low: "Low cloud cover (%)",
  cloud_cover_mid: "Mid cloud cover (%)",
  cloud_cover_high: "High cloud cover (%)",
  wind_speed_10m: "Wind speed 10m (m/s)",
  wind_speed_100m: "Wind speed 100m (m/s)",
  wind_direction_10m: "Wind direction 10m (°)",
  wind_direction_100m: "Wind direction 100m (°)",
  wind_gusts_10m: "Wind gusts 10m (m/s)",
  weather_code: WEATHER_CODE_COLUMN,
  shortwave_radiation: "Shortwave radiation (W/m2)",
  sunshine_duration: "Sunshine duration (s)",
  et0_fao_evapotranspiration: "FAO reference evapotranspiration hourly (mm)",
  vapour_pressure_deficit: "Vapour pressure deficit (kPa)"
};

export const DAILY_VARIABLES: Readonly<Record<string, string>> = {
  weather_code: DAILY_WEATHER_CODE_COLUMN,
  temperature_2m_max: "Daily max temperature (°C)",
  temperature_2m_min: "Daily min temperature (°C)",
  temperature_2m_mean: "Daily mean temperature (°C)",
  apparent_temperature_max: "Daily max apparent temperature (°C)",
  apparent_temperature_min: "Daily min apparent temperature (°C)",
  apparent_temperature_mean: "Daily mean apparent temperature (°C)",
  precipitation_sum: "Daily precipitation (mm)",
  precipitation_hours: "Precipitation hours (h)",
  daylight_duration: "Daylight duration (s)",
  sunshine_duration: "Daily sunshine duration (s)",
  shortwave_radiation_sum: "Daily shortwave radiation (W/m2)",
  wind_speed_10m_max: "Daily max wind speed 10m (m/s)",
  wind_gusts_10m_max: "Daily max wind gusts 10m (m/s)",
  wind_direction_10m_dominant: "Dominant wind direction 10m (°)",
  relative_humidity_2m_mean: "Daily mean relative humidity (%)",
  dew_point_2m_mean: "Daily mean dew point (°C)",
  cloud_cover_mean: "Daily mean cloud cover (%)",
  surface_pressure_mean: "Daily mean surface pressure (hPa)",
  et0_fao_evapotranspiration: "FAO reference evapotranspiration daily (mm)",
  sunrise: "Sunrise",
  sunset: "Sunset"
};

/** Daily fields holding a time of day; only `HH:mm` is kept. */
export const TIME_OF_DAY_DAILY_VARIABLES: readonly string[] = ["sunrise", "sunset"];

/** Placed right after the region column whenever present. */
export const CODE_COLUMNS: readonly string[] = [WEATHER_CODE_COLUMN, DAILY_WEATHER_CODE_COLUMN];

export const ARCHIVE_UNIT_PARAMS = {
  pressure_unit: "hPa",
  temperature_unit: "celsius",
  wind_speed_unit: "ms"
} as const;
