export { errorHandler, toAppError } from './errorHandler';
export { notFound } from './notFound';
export { requestLogger } from './requestLogger';
export { validateRequest } from './validateRequest';
