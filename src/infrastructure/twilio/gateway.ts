import twilio from 'twilio';
import type { Logger } from 'pino';
import type {
  NotificationGateway,
  OutboundCall,
  OutboundMessage,
} from '../../application/ports.js';

/**
 * The two Twilio resources this service uses.
 *
 * Structural so tests can pass a stand-in; the real `twilio()` client
 * satisfies it.
 */
export interface TwilioResources {
  messages: {
    create(params: { body: string; from: string; to: string }): Promise<{ sid: string }>;
  };
  calls: {
    create(params: { twiml: string; from: string; to: string }): Promise<{ sid: string }>;
  };
}

/** Spoken TwiML for a call; the text is XML-escaped by the builder. */
export function buildSayTwiml(text: string): string {
  const response = new twilio.twiml.VoiceResponse();
  response.say(text);
  return response.toString();
}

export function createTwilioClient(accountSid: string, authToken: string): TwilioResources {
  return twilio(accountSid, authToken);
}

/**
 * Sends SMS/WhatsApp messages and places voice calls through Twilio.
 * WhatsApp is selected by `whatsapp:`-prefixed addresses, so both go
 * through `messages.create`.
 */
export function createTwilioGateway(client: TwilioResources, log: Logger): NotificationGateway {
  return {
    async sendMessage(message: OutboundMessage) {
      const created = await client.messages.create({
        body: message.body,
        from: message.from,
        to: message.to,
      });
      log.debug({ sid: created.sid, from: message.from, to: message.to }, 'Twilio message created');
      return { sid: created.sid };
    },

    async placeCall(call: OutboundCall) {
      const created = await client.calls.create({
        twiml: buildSayTwiml(call.say),
        from: call.from,
        to: call.to,
      });
      log.debug({ sid: created.sid, from: call.from, to: call.to }, 'Twilio call created');
      return { sid: created.sid };
    },
  };
}
