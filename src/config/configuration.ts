export const configuration = () => ({
  telegram: {
    botToken: process.env.TELEGRAM_BOT_TOKEN,
    adminUsername: process.env.ADMIN_USERNAME,
  },
  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: Number.parseInt(process.env.REDIS_PORT || '6379', 10),
    password: process.env.REDIS_PASSWORD,
  },
  chats: {
    listSize: Number.parseInt(process.env.CHAT_LIST_SIZE || '10', 10),
  },
  album: {
    waitTimeoutMs: Number.parseInt(
      process.env.ALBUM_WAIT_TIMEOUT_MS || '1000',
      10,
    ),
  },
});

export type AppConfiguration = ReturnType<typeof configuration>;
