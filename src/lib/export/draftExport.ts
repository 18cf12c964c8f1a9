const pad = (value: number): string => String(value).padStart(2, "0");

export const formatExportTimestamp = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(
    date.getHours(),
  )}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

export const buildDraftFileName = (date: Date = new Date()): string =>
  `dss_final_${formatExportTimestamp(date)}.txt`;

export const buildDraftDownloadHeaders = (fileName: string): Record<string, string> => ({
  "Content-Type": "text/plain; charset=utf-8",
  "Content-Disposition": `attachment; filename="${fileName}"`,
  "Cache-Control": "no-store",
});
