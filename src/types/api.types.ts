export interface ErrorBody {
  error: string;
  message: string;
  details?: unknown;
}
