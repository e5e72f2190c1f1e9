import humanizeDuration from "humanize-duration";

export function formatDuration(milliseconds: number): string {
  return humanizeDuration(milliseconds, {
    units: ["m", "s", "ms"],
    round: true,
    largest: 2,
  });
}

export function humanFileSize(size: number): string {
  const i = size == 0 ? 0 : Math.floor(Math.log(size) / Math.log(1024));
  return (
    +(size / Math.pow(1024, i)).toFixed(2) + ["B", "kB", "MB", "GB", "TB"][i]
  );
}
