export { RequestExecutor, type RequestExecutorConfig, type ExecutorProvider } from './request-executor';
export { AxiosTransport, type AxiosTransportOptions } from './axios-transport';
