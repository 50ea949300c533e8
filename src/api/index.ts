/**
 * UAE Mortgage Advisor - API Module Export
 */

export { createApp, AppDependencies } from './app';
export { createChatRoutes, ChatRouteDependencies } from './routes/chat.routes';
export { createCalculatorRoutes } from './routes/calculator.routes';
export { createLeadRoutes } from './routes/lead.routes';
export { createAdminAuthMiddleware } from './middleware/auth.middleware';
export { errorHandler } from './middleware/error.middleware';
