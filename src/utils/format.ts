const pad2 = (n: number) => String(n).padStart(2, '0');

/** Seconds → HH:MM:SS, rounded to the nearest whole second. */
export function formatDuration(seconds: number): string {
  const total = Math.round(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  return `${pad2(hours)}:${pad2(minutes)}:${pad2(secs)}`;
}

/** Local time as YYYY.MM.DD-HH.MM.SS, used to name combined audio. */
export function formatRunTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}.${pad2(date.getMonth() + 1)}.${pad2(date.getDate())}` +
    `-${pad2(date.getHours())}.${pad2(date.getMinutes())}.${pad2(date.getSeconds())}`
  );
}
