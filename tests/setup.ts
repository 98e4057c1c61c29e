process.env.NODE_ENV = "test";
process.env.OPENAI_API_KEY ??= "test-key";
process.env.LOG_LEVEL = "error";
process.env.LOG_TO_FILE = "false";
process.env.TOKEN_ENCODING = "none";
