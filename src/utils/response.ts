import { Response } from 'express';
import { ApiResponse } from '../types';

/**
 * Send a success response
 */
export const sendSuccess = <T>(
  res: Response,
  data: T,
  message?: string,
  statusCode = 200
): Response => {
  const response: ApiResponse<T> = {
    success: true,
    data,
    message,
    timestamp: new Date().toISOString(),
  };

  return res.status(statusCode).json(response);
};

/**
 * Send an error response, optionally with the data that explains it
 */
export const sendError = <T = undefined>(
  res: Response,
  error: string,
  statusCode = 500,
  message?: string,
  data?: T
): Response => {
  const response: ApiResponse<T> = {
    success: false,
    data,
    error,
    message,
    timestamp: new Date().toISOString(),
  };

  return res.status(statusCode).json(response);
};

/**
 * Send a file download
 */
export const sendFile = (
  res: Response,
  body: Buffer,
  filename: string,
  contentType: string
): Response => {
  res.status(200);
  res.attachment(filename);
  res.type(contentType);
  return res.send(body);
};
