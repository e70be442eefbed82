declare const __DEBUG__: boolean;
