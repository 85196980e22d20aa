export * from './errorCodes';
export * from './VoiceChessError';
