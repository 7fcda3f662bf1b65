export { HttpExceptionFilter } from './http-exception.filter';
