import { AnomalyDetector } from "../crawler/anomaly";
import { collectFrontHalves } from "../crawler/extract";
import { Navigator } from "../crawler/navigation";
import { PlaywrightDriver } from "../crawler/playwright";
import { engineConfigFromEnv } from "../jobs/crawl";

async function main() {
  const username = (process.argv[2] ?? "").replace(/^@/, "");
  if (!username) throw new Error("usage: probe <publisher-username> [max-videos]");
  const max = Number(process.argv[3] ?? 12);

  const config = engineConfigFromEnv();
  const driver = await PlaywrightDriver.launch();
  try {
    const navigator = new Navigator(driver, config);
    await navigator.enter(username);
    const anomaly = await new AnomalyDetector(driver, config).inspect("PublisherPage");
    const fronts =
      anomaly === "Normal" ? await collectFrontHalves(driver, { ...config, max, baseUrl: config.baseUrl }) : [];
    const result = { url: await driver.currentUrl(), anomaly, fronts };
    process.stdout.write(JSON.stringify(result, null, 2) + "\n");
  } finally {
    await driver.close();
  }
}

main().catch((err) => {
  process.stderr.write(String(err) + "\n");
  process.exit(1);
});
