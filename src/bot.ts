import { Api, TelegramClient } from "telegram";
import { CallbackQuery, type CallbackQueryEvent } from "telegram/events/CallbackQuery";
import { NewMessage, type NewMessageEvent } from "telegram/events/NewMessage";
import { LogLevel } from "telegram/extensions/Logger";
import { StringSession } from "telegram/sessions";
import type { ActionSink } from "./actionLog.ts";
import { runDiscovery } from "./bot/discoveryFlow.ts";
import { admitQuery } from "./bot/queryAdmission.ts";
import { runSelection } from "./bot/selectionFlow.ts";
import type { ConversationChannel } from "./channel/types.ts";
import { searchRunOptions, type AppConfig } from "./config.ts";
import { TelegramControlRenderer, toIncomingQuery, toSelectionAction } from "./telegram/botSurface.ts";
import { TelegramUserChannel } from "./telegram/userChannel.ts";
import { errorMessage, sleep } from "./utils.ts";

const CONNECTION_RETRIES = 5;
const STOP_DRAIN_TIMEOUT_MS = 4_000;

export type UserLoginPrompts = {
  phoneNumber: () => Promise<string>;
  phoneCode: () => Promise<string>;
  password: () => Promise<string>;
};

type RelayBotOptions = {
  appConfig: AppConfig;
  log: ActionSink;
  prompts: UserLoginPrompts;
};

/**
 * Owns the two Telegram clients: the UI bot that talks to requesters and the
 * user account that talks to the remote search bot. Every query and every
 * menu tap runs as its own task.
 */
export class RelayBot {
  private readonly appConfig: AppConfig;
  private readonly log: ActionSink;
  private readonly prompts: UserLoginPrompts;
  private readonly userSession: StringSession;
  private readonly userClient: TelegramClient;
  private readonly botClient: TelegramClient;
  private readonly renderer: TelegramControlRenderer;
  private readonly channel: ConversationChannel;
  private readonly inFlight = new Set<Promise<unknown>>();
  private readonly messageFilter = new NewMessage({ incoming: true });
  private readonly callbackFilter = new CallbackQuery({});
  private isStopping = false;

  constructor({ appConfig, log, prompts }: RelayBotOptions) {
    this.appConfig = appConfig;
    this.log = log;
    this.prompts = prompts;

    this.userSession = new StringSession(appConfig.userSession);
    this.userClient = new TelegramClient(this.userSession, appConfig.apiId, appConfig.apiHash, {
      connectionRetries: CONNECTION_RETRIES
    });
    this.botClient = new TelegramClient(new StringSession(""), appConfig.apiId, appConfig.apiHash, {
      connectionRetries: CONNECTION_RETRIES
    });
    this.userClient.setLogLevel(LogLevel.ERROR);
    this.botClient.setLogLevel(LogLevel.ERROR);

    this.renderer = new TelegramControlRenderer(this.botClient);
    this.channel = new TelegramUserChannel({
      client: this.userClient,
      targetBotUsername: appConfig.targetBotUsername,
      log
    });
  }

  async start() {
    this.isStopping = false;
    await this.userClient.start({
      phoneNumber: this.appConfig.userPhone ? async () => this.appConfig.userPhone : this.prompts.phoneNumber,
      phoneCode: this.prompts.phoneCode,
      password: this.prompts.password,
      onError: (error: Error) => {
        this.log.logAction({ kind: "bot_error", content: `user_login: ${errorMessage(error)}` });
      }
    });
    if (!this.appConfig.userSession) {
      console.log(`Store this as TELEGRAM_USER_SESSION to skip the login next time:\n${this.userSession.save()}`);
    }

    await this.botClient.start({ botAuthToken: this.appConfig.botToken });
    this.botClient.addEventHandler(this.onMessage, this.messageFilter);
    this.botClient.addEventHandler(this.onCallback, this.callbackFilter);

    const me = await this.botClient.getMe();
    this.log.logAction({
      kind: "bot_runtime",
      content: "runtime_started",
      metadata: {
        bot: me instanceof Api.User ? me.username ?? null : null,
        target: this.appConfig.targetBotUsername
      }
    });
  }

  async stop() {
    this.isStopping = true;
    this.botClient.removeEventHandler(this.onMessage, this.messageFilter);
    this.botClient.removeEventHandler(this.onCallback, this.callbackFilter);
    await Promise.race([Promise.allSettled([...this.inFlight]), sleep(STOP_DRAIN_TIMEOUT_MS)]);
    await this.botClient.disconnect();
    await this.userClient.disconnect();
  }

  getRuntimeState() {
    return {
      isStopping: this.isStopping,
      inFlightTasks: this.inFlight.size,
      target: this.appConfig.targetBotUsername
    };
  }

  private track(kind: string, task: Promise<unknown>) {
    const guarded = task.catch((error: unknown) => {
      this.log.logAction({ kind: "bot_error", content: `${kind}: ${errorMessage(error)}`, metadata: { error } });
    });
    this.inFlight.add(guarded);
    void guarded.finally(() => {
      this.inFlight.delete(guarded);
    });
  }

  private readonly onMessage = (event: NewMessageEvent) => {
    if (this.isStopping) return;
    this.track("message_handler", this.handleMessage(event));
  };

  private readonly onCallback = (event: CallbackQueryEvent) => {
    if (this.isStopping) return;
    this.track(
      "selection_handler",
      runSelection(
        {
          channel: this.channel,
          renderer: this.renderer,
          log: this.log,
          runOptions: searchRunOptions(this.appConfig)
        },
        toSelectionAction(this.botClient, event)
      )
    );
  };

  private async handleMessage(event: NewMessageEvent) {
    const incoming = await toIncomingQuery(event);
    const admission = admitQuery(incoming);
    if (!admission.admitted) return;

    this.log.logAction({
      kind: "discovery_request",
      content: "query_received",
      chatId: incoming.chatId,
      messageId: incoming.messageId,
      userId: incoming.senderId,
      metadata: { query: admission.query }
    });
    await runDiscovery(
      {
        channel: this.channel,
        renderer: this.renderer,
        log: this.log,
        runOptions: searchRunOptions(this.appConfig),
        labelMaxLength: this.appConfig.labelMaxLength
      },
      { chatId: incoming.chatId, messageId: incoming.messageId, query: admission.query }
    );
  }
}
