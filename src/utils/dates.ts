import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';

dayjs.extend(utc);

// Yahoo timestamps are epoch seconds; calendar dates are read in UTC
export function formatEpochDate(epochSeconds: number): string {
  return dayjs.unix(epochSeconds).utc().format('YYYY-MM-DD');
}

export function formatEpochIso(epochSeconds: number): string {
  return dayjs.unix(epochSeconds).toISOString();
}
