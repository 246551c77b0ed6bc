import { createCanvas } from "@napi-rs/canvas";
import fs from "fs/promises";
import path from "path";

export const SUMMARY_IMAGE_FILE = "summary.png";

export interface SummaryImageInput {
  totalCountries: number;
  topCountries: Array<{ name: string; estimated_gdp: number | null }>;
  lastRefreshedAt: Date;
}

const WIDTH = 800;
const HEIGHT = 600;

const gdpFormatter = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatGdp(gdp: number | null) {
  return gdp === null ? "N/A" : gdpFormatter.format(gdp);
}

export function formatTimestamp(date: Date) {
  return `${date.toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

export function summaryLines(input: SummaryImageInput) {
  return {
    title: "Country Currency Summary",
    total: `Total Countries: ${input.totalCountries}`,
    topHeader: "Top 5 Countries by Estimated GDP",
    top: input.topCountries
      .slice(0, 5)
      .map((c, i) => `${i + 1}. ${c.name}: ${formatGdp(c.estimated_gdp)}`),
    refreshed: `Last Refreshed: ${formatTimestamp(input.lastRefreshedAt)}`,
  };
}

export function renderSummaryImage(input: SummaryImageInput): Buffer {
  const lines = summaryLines(input);
  const canvas = createCanvas(WIDTH, HEIGHT);
  const ctx = canvas.getContext("2d");

  ctx.fillStyle = "#ffffff";
  ctx.fillRect(0, 0, WIDTH, HEIGHT);

  ctx.textAlign = "center";
  ctx.textBaseline = "top";

  ctx.fillStyle = "#2980b9";
  ctx.font = "bold 40px sans-serif";
  ctx.fillText(lines.title, WIDTH / 2, 30);

  ctx.strokeStyle = "#c8c8c8";
  ctx.lineWidth = 2;
  ctx.beginPath();
  ctx.moveTo(50, 90);
  ctx.lineTo(WIDTH - 50, 90);
  ctx.stroke();

  ctx.fillStyle = "#000000";
  ctx.font = "28px sans-serif";
  ctx.fillText(lines.total, WIDTH / 2, 120);

  let y = 170;
  if (lines.top.length) {
    ctx.fillStyle = "#2980b9";
    ctx.fillText(lines.topHeader, WIDTH / 2, y);
    y += 40;

    ctx.textAlign = "left";
    ctx.fillStyle = "#000000";
    ctx.font = "20px sans-serif";
    for (const line of lines.top) {
      ctx.fillText(line, 100, y);
      y += 35;
    }
    ctx.textAlign = "center";
  }

  y += 20;
  ctx.beginPath();
  ctx.moveTo(50, y);
  ctx.lineTo(WIDTH - 50, y);
  ctx.stroke();

  ctx.font = "16px sans-serif";
  ctx.fillText(lines.refreshed, WIDTH / 2, y + 30);

  return canvas.toBuffer("image/png");
}

export function summaryImagePath(cacheDir: string) {
  return path.resolve(cacheDir, SUMMARY_IMAGE_FILE);
}

export async function generateSummaryImage(cacheDir: string, input: SummaryImageInput) {
  const imgPath = summaryImagePath(cacheDir);
  await fs.mkdir(path.dirname(imgPath), { recursive: true });
  await fs.writeFile(imgPath, renderSummaryImage(input));
  return imgPath;
}
