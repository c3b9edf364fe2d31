export const config = {
  port: Number(process.env.PORT ?? 3000),
  databaseUrl: process.env.DATABASE_URL ?? "",
  redisUrl: process.env.REDIS_URL ?? "",
  uploadDir: process.env.UPLOAD_DIR ?? "uploads",
  maxResumeBytes: Number(process.env.MAX_RESUME_BYTES ?? 10 * 1024 * 1024)
};
