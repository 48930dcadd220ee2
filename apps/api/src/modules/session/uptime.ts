const pad = (value: number) => value.toString().padStart(2, '0');

/** `1d 03h 07m` style uptime. */
export const formatUptime = (ms: number): string => {
  const totalMinutes = Math.floor(Math.max(0, ms) / 60_000);
  const days = Math.floor(totalMinutes / (24 * 60));
  const hours = Math.floor((totalMinutes % (24 * 60)) / 60);
  const minutes = totalMinutes % 60;
  return `${days}d ${pad(hours)}h ${pad(minutes)}m`;
};
