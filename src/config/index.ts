export { Settings, loadSettings, isModelConfigured, resolveModelEndpoint, GROQ_BASE_URL } from './settings';
