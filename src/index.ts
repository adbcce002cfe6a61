export * from './features/mail/types';
export * from './features/mail/threadKey';
export * from './features/mail/classification';
export * from './features/mail/utils';
export * from './features/mail/overview';
export * from './features/mail/threadSynthesizer';
export * from './features/mail/viewPipeline';
export * from './features/mail/messageRow';
export * from './features/mail/mailRepository';
export * from './features/search/booleanQuery';
export * from './features/search/lowering';
export * from './features/search/searchBackend';
export * from './features/search/searchDebouncer';
export * from './features/virtualList/virtualWindow';
export * from './lib/metrics';
export * from './lib/sanitizeHtml';
