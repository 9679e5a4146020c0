#!/usr/bin/env node
/**
 * pop3-mailbox command line
 *
 * Signs in, lists the mailbox and reads, deletes or refreshes on request.
 * Configuration comes from POP3_* environment variables.
 */

import * as readline from 'readline';
import { createSessionContext, type SessionContext } from './session/context.js';
import { isMailClientError } from './types/errors.js';
import type { Message } from './types/message.js';

/**
 * Prompts for one line; hidden input echoes nothing on a TTY
 */
function prompt(question: string, hidden: boolean = false): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    if (hidden && process.stdin.isTTY) {
      process.stdout.write(question);
      const stdin = process.stdin;
      stdin.setRawMode(true);
      stdin.resume();
      stdin.setEncoding('utf8');

      let input = '';
      const onData = (char: string) => {
        if (char === '\n' || char === '\r' || char === '\u0004') {
          stdin.setRawMode(false);
          stdin.removeListener('data', onData);
          rl.close();
          process.stdout.write('\n');
          resolve(input);
        } else if (char === '\u0003') {
          process.exit(130);
        } else if (char === '\u007F' || char === '\b') {
          input = input.slice(0, -1);
        } else {
          input += char;
        }
      };
      stdin.on('data', onData);
    } else {
      rl.question(question, (answer) => {
        rl.close();
        resolve(answer.trim());
      });
    }
  });
}

function formatSender(message: Message): string {
  const sender = message.from[0];
  if (!sender) return '(unknown sender)';
  const address = sender.host ? `${sender.mailbox}@${sender.host}` : sender.mailbox;
  return sender.name ? `${sender.name} <${address}>` : address;
}

function printMailbox(context: SessionContext): void {
  const { session } = context;
  const messages = session.getMessages();
  console.log(`\n${session.getAddress() ?? ''}: ${session.getMessageCount()} message(s)`);
  if (session.snapshot?.stale) {
    console.log('(list may be out of date, type "refresh")');
  }
  console.log('─'.repeat(45));
  for (const message of messages) {
    console.log(`${String(message.seqno).padStart(3)}. ${message.subject || '(no subject)'}`);
    console.log(`     From: ${formatSender(message)}`);
  }
  console.log('─'.repeat(45));
}

function printMessage(message: Message): void {
  console.log(`\nSubject: ${message.subject}`);
  console.log(`From: ${formatSender(message)}`);
  if (message.date) {
    console.log(`Date: ${message.date.toISOString()}`);
  }
  console.log();
  console.log(message.text);
}

function reportError(error: unknown): void {
  if (isMailClientError(error)) {
    console.error(`Error (${error.kind}): ${error.message}`);
  } else {
    console.error('Error:', error instanceof Error ? error.message : error);
  }
}

async function signInLoop(context: SessionContext): Promise<void> {
  for (;;) {
    const address = await prompt('Address: ');
    const secret = await prompt('Password: ', true);
    try {
      await context.session.signIn(address, secret);
      return;
    } catch (error) {
      reportError(error);
    }
  }
}

async function commandLoop(context: SessionContext): Promise<void> {
  const { session } = context;
  printMailbox(context);

  for (;;) {
    const line = await prompt('\n[list | read <n> | delete <n> | refresh | quit] > ');
    const [command = '', argument] = line.split(/\s+/);

    try {
      switch (command.toLowerCase()) {
        case 'list':
          printMailbox(context);
          break;
        case 'read': {
          const message = session.getMessages().find(m => m.seqno === Number(argument));
          if (message) {
            printMessage(message);
          } else {
            console.log(`No message ${argument ?? ''} in the current list`);
          }
          break;
        }
        case 'delete':
          await session.deleteMessage(Number(argument));
          console.log(`Message ${argument} deleted`);
          break;
        case 'refresh':
          await session.refreshMailbox();
          printMailbox(context);
          break;
        case 'quit':
        case 'exit':
          return;
        case '':
          break;
        default:
          console.log(`Unknown command "${command}"`);
      }
    } catch (error) {
      reportError(error);
    }
  }
}

async function main(): Promise<void> {
  let context: SessionContext;
  try {
    context = await createSessionContext();
  } catch (error) {
    reportError(error);
    process.exit(1);
  }

  await signInLoop(context);
  await commandLoop(context);

  await context.session.endSession();
  process.exit(0);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
