export interface HandlerResult {
  statusCode: 200 | 400 | 500;
  body: string;
}
