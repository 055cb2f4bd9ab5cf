/**
 * Narration lines, per language.
 */

import type { Language } from '@parley/core';

export interface PromptSet {
  welcome: string;
  startPrompt: string;
  dictate: string;
  dictationFailed: string;
  dictationTimeout: string;
  sendFailed: string;
  copyReply: string;
  noReply: string;
  retry: string;
  nextQuestion: string;
  goodbye: string;
}

export const PROMPTS: Record<Language, PromptSet> = {
  ja: {
    welcome: '音声での質問を始めます。質問を話し終えたら「送信」と言ってください。',
    startPrompt: '始めてもよろしいですか？「はい」か「いいえ」で答えてください。',
    dictate: '質問をどうぞ。',
    dictationFailed: '音声入力を開始できませんでした。もう一度試しますか？',
    dictationTimeout: '時間切れです。ここまでの内容を送信します。',
    sendFailed: '送信できませんでした。画面で送信してください。',
    copyReply: '回答が表示されたらコピーしてください。コピーできましたか？',
    noReply: '新しい回答が見つかりませんでした。もう一度試しますか？',
    retry: 'すみません、聞き取れませんでした。「はい」か「いいえ」でお答えください。',
    nextQuestion: 'ほかに質問はありますか？',
    goodbye: '終了します。お疲れさまでした。',
  },
  en: {
    welcome: 'Starting voice questions. When you finish speaking your question, say "send".',
    startPrompt: 'Shall we begin? Please answer yes or no.',
    dictate: 'Go ahead with your question.',
    dictationFailed: 'Could not start dictation. Try again?',
    dictationTimeout: 'Time is up. Sending what was captured so far.',
    sendFailed: 'Could not send the message. Please send it on screen.',
    copyReply: 'When the reply appears, copy it. Have you copied it?',
    noReply: 'No new reply was found on the clipboard. Try again?',
    retry: 'Sorry, I did not catch that. Please answer yes or no.',
    nextQuestion: 'Do you have another question?',
    goodbye: 'Ending the session. Goodbye.',
  },
};
