import fs from "node:fs";
import path from "node:path";

// Layouts Playwright unpacks Chromium into, per platform.
const CHROMIUM_LAYOUTS: Record<string, string[][]> = {
  darwin: [
    ["chrome-mac-arm64", "Google Chrome for Testing.app", "Contents", "MacOS", "Google Chrome for Testing"],
    ["chrome-mac-x64", "Google Chrome for Testing.app", "Contents", "MacOS", "Google Chrome for Testing"],
    ["chrome-mac", "Chromium.app", "Contents", "MacOS", "Chromium"],
  ],
  linux: [["chrome-linux64", "chrome"], ["chrome-linux", "chrome"]],
  win32: [["chrome-win64", "chrome.exe"], ["chrome-win", "chrome.exe"]],
};

function isExecutable(p: string) {
  try {
    fs.accessSync(p, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * An explicit path wins; otherwise the newest Chromium under `.pw-browsers`
 * (PLAYWRIGHT_BROWSERS_PATH=.pw-browsers). Undefined lets Playwright pick.
 */
export function resolveChromiumExecutablePath(explicit?: string, root = process.cwd()) {
  if (explicit && isExecutable(explicit)) return explicit;

  const browsersDir = path.join(root, ".pw-browsers");
  if (!fs.existsSync(browsersDir)) return undefined;

  const dirs = fs
    .readdirSync(browsersDir, { withFileTypes: true })
    .filter((d) => d.isDirectory() && d.name.startsWith("chromium-"))
    .map((d) => d.name)
    .sort()
    .reverse();

  const layouts = CHROMIUM_LAYOUTS[process.platform] ?? [];
  for (const dir of dirs) {
    for (const layout of layouts) {
      const candidate = path.join(browsersDir, dir, ...layout);
      if (isExecutable(candidate)) return candidate;
    }
  }
  return undefined;
}
