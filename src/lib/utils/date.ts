import { TIME_TOKEN_SUFFIX } from "@/lib/domain/constants";

export function epochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/** `time` query value for control.cgi: whole epoch seconds followed by "999". */
export function controlTimeToken(date: Date): string {
  return `${epochSeconds(date)}${TIME_TOKEN_SUFFIX}`;
}

export function formatTimestamp(date: Date): string {
  const day = date.getDate().toString().padStart(2, "0");
  const month = (date.getMonth() + 1).toString().padStart(2, "0");
  const year = date.getFullYear();

  const time = new Intl.DateTimeFormat("en-GB", {
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: false,
  }).format(date);

  return `${day}-${month}-${year}, ${time}`;
}
