import os from "os";
import path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      DOWNLOAD_TEMP_DIR: path.join(os.tmpdir(), "media-fetch-test"),
      COOKIES_PATH: path.join(os.tmpdir(), "media-fetch-test-cookies.txt"),
      FFMPEG_FASTSTART: "false",
      RATE_LIMIT_PER_MINUTE: "1000",
      MAX_CONCURRENT_DOWNLOADS: "2",
      MAX_FILE_SIZE: "1048576",
    },
  },
});
