export type StatusBucket = '2xx' | '3xx' | '4xx' | '5xx' | 'unknown';

export const statusBucket = (status: number): StatusBucket => {
  if (status >= 200 && status < 300) {
    return '2xx';
  }
  if (status >= 300 && status < 400) {
    return '3xx';
  }
  if (status >= 400 && status < 500) {
    return '4xx';
  }
  if (status >= 500 && status < 600) {
    return '5xx';
  }

  return 'unknown';
};
