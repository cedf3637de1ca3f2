export { handleChatRequest, handleCardAction } from './requestHandler.js';
export type { ChatHandlerContext } from './requestHandler.js';
