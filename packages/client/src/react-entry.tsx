/**
 * React bindings for @pairtalk/client.
 * Provider + hooks; import from "@pairtalk/client/react".
 */

import {
  createContext,
  useCallback,
  useContext,
  useEffect,
  useMemo,
  useRef,
  useState,
  type ReactNode,
} from "react";
import {
  createChatClient,
  type ChatClient,
  type ChatClientConfig,
  type ChatClientState,
  type ChatEntry,
} from "./client.js";

const ChatContext = createContext<ChatClient | null>(null);

export interface ChatProviderProps extends Partial<ChatClientConfig> {
  children: ReactNode;
  /** Pre-created client (call createChatClient yourself). */
  client?: ChatClient;
}

/**
 * Provides the chat client to the tree. Pass either `client` or config (`baseUrl`, `username`).
 * A client created from config is created once and left on unmount.
 */
export function ChatProvider(props: ChatProviderProps) {
  const { children, client: clientProp } = props;
  const configRef = useRef<ChatClientConfig | null>(null);
  if (!configRef.current && !clientProp && props.baseUrl && props.username) {
    configRef.current = {
      baseUrl: props.baseUrl,
      username: props.username,
      wsUrl: props.wsUrl,
      getAuthToken: props.getAuthToken,
      queuePollIntervalMs: props.queuePollIntervalMs,
      fetch: props.fetch,
    };
  }
  const config = configRef.current;

  const clientFromConfig = useMemo(() => {
    if (clientProp || !config) return null;
    return createChatClient(config);
  }, [clientProp, config]);

  const client = clientProp ?? clientFromConfig;

  useEffect(() => {
    if (!clientFromConfig) return;
    return () => clientFromConfig.leave();
  }, [clientFromConfig]);

  if (!client) {
    throw new Error(
      "ChatProvider: pass either `client` or config (`baseUrl` and `username`) to create the client."
    );
  }

  return <ChatContext.Provider value={client}>{children}</ChatContext.Provider>;
}

export function useChatClient(): ChatClient {
  const client = useContext(ChatContext);
  if (!client) {
    throw new Error("useChatClient must be used within ChatProvider");
  }
  return client;
}

/** Current client state; re-renders on every change. */
export function useChatState(): ChatClientState {
  const client = useChatClient();
  const [state, setState] = useState<ChatClientState>(() => client.getState());
  useEffect(() => {
    setState(client.getState());
    return client.subscribe(setState);
  }, [client]);
  return state;
}

export interface UseChatMessagesReturn {
  messages: ChatEntry[];
  sendMessage: (text: string) => boolean;
}

export function useChatMessages(): UseChatMessagesReturn {
  const client = useChatClient();
  const { messages } = useChatState();
  const sendMessage = useCallback((text: string) => client.sendMessage(text), [client]);
  return { messages, sendMessage };
}

export interface UseMatchmakingOptions {
  /** Call startChat on mount (default false). */
  autoStart?: boolean;
}

export interface UseMatchmakingReturn {
  phase: ChatClientState["phase"];
  roomCode: string | null;
  queuePosition: number | null;
  queueSize: number | null;
  lastError: ChatClientState["lastError"];
  startChat: () => Promise<void>;
  leave: () => void;
}

/** Matchmaking status and controls. With autoStart, leaves the chat on unmount. */
export function useMatchmaking(options: UseMatchmakingOptions = {}): UseMatchmakingReturn {
  const { autoStart = false } = options;
  const client = useChatClient();
  const state = useChatState();

  const startChat = useCallback(() => client.startChat(), [client]);
  const leave = useCallback(() => client.leave(), [client]);

  useEffect(() => {
    if (!autoStart) return;
    void client.startChat();
    return () => client.leave();
  }, [autoStart, client]);

  return {
    phase: state.phase,
    roomCode: state.roomCode,
    queuePosition: state.queuePosition,
    queueSize: state.queueSize,
    lastError: state.lastError,
    startChat,
    leave,
  };
}
