// =============================================================================
// Lumen Harbor Web — Talk page
// Single-thread chat with the assistant. The user's message is shown as soon as
// it is sent; if the request fails it is withdrawn and put back in the composer,
// which stays read-only until then.
// =============================================================================

import { useState, type KeyboardEvent } from 'react';
import { ChatRequestSchema, ENDPOINTS, type ChatMessage, type ChatResponse } from '@lumen-harbor/shared';
import { api } from '../services/api.js';
import { reportError } from '../services/telemetry.js';
import { useExperienceMode } from '../stores/experience.js';
import { PageHeader } from '../components/ui.js';

export function TalkPage() {
  const { mode } = useExperienceMode();
  const [messages, setMessages] = useState<ChatMessage[]>([]);
  const [input, setInput] = useState('');
  const [sending, setSending] = useState(false);
  const [error, setError] = useState<string | null>(null);

  async function handleSend() {
    const parsed = ChatRequestSchema.safeParse({ message: input });
    if (!parsed.success || sending) return;
    const { message } = parsed.data;

    setSending(true);
    setError(null);
    setInput('');
    setMessages((prev) => [...prev, { role: 'user', text: message }]);

    try {
      const res = await api.post<ChatResponse>(ENDPOINTS.chat, { message });
      const reply = typeof res?.response === 'string' ? res.response : '';
      setMessages((prev) => [...prev, { role: 'assistant', text: reply }]);
    } catch (err) {
      reportError(err, 'talk.send');
      setError('Could not reach the assistant right now.');
      setMessages((prev) => prev.slice(0, -1));
      setInput(message);
    } finally {
      setSending(false);
    }
  }

  function handleKeyDown(e: KeyboardEvent<HTMLTextAreaElement>) {
    if (e.key === 'Enter' && !e.shiftKey) {
      e.preventDefault();
      void handleSend();
    }
  }

  return (
    <div className="page narrow">
      <PageHeader
        title="Talk"
        description={mode === 'gentle' ? 'Say as much or as little as you like.' : undefined}
      />

      <div className="card chat" data-testid="chat-log">
        {messages.length === 0 && <p className="muted">Nothing here yet. Start whenever you’re ready.</p>}
        {messages.map((m, idx) => (
          <div key={idx} className={`bubble ${m.role}`} data-testid={`chat-${m.role}`}>
            {mode === 'structured' && <div className="bubble-role">{m.role === 'user' ? 'You' : 'Assistant'}</div>}
            {m.text}
          </div>
        ))}
        {sending && <p className="muted">…</p>}
      </div>

      {error && <p role="status" className="muted error" data-testid="chat-error">{error}</p>}

      <div className="card row">
        <textarea
          className="field"
          placeholder="Type a message. Enter sends, Shift+Enter adds a line."
          value={input}
          onChange={(e) => setInput(e.target.value)}
          onKeyDown={handleKeyDown}
          readOnly={sending}
          aria-label="Message"
          data-testid="chat-input"
        />
        <button
          className="btn primary"
          onClick={() => void handleSend()}
          disabled={sending || !input.trim()}
          data-testid="chat-send"
        >
          Send
        </button>
      </div>
    </div>
  );
}
