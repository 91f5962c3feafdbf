// Runs before any module is loaded, so Config picks these up
process.env.NODE_ENV = 'test';
process.env.LOG_FILE = '';
process.env.LOG_LEVEL = 'error';
process.env.MODEL = 'test-model';
process.env.OPENAI_API = 'test-secret';
process.env.BASE_URL_GROQ = 'http://localhost:9999/openai/v1';
process.env.MONGO_CONNECTION_STRING = 'mongodb://localhost:27017';
