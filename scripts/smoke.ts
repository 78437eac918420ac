import 'dotenv/config';
import WebSocket from 'ws';

const PORT = Number(process.env.PORT || 7860);
const url = `ws://localhost:${PORT}/ws`;

type Frame = { type?: unknown; text?: unknown; message?: unknown; emotion?: unknown };

async function run() {
  await new Promise<void>((resolve, reject) => {
    const ws = new WebSocket(url);
    const replies: Frame[] = [];
    const prompts = ['hello', 'help'];

    ws.on('open', () => {
      ws.send(JSON.stringify({ type: 'login', username: 'smoke' }));
    });

    ws.on('message', (raw) => {
      const msg: Frame = JSON.parse(raw.toString());
      if (msg.type === 'session') {
        ws.send(JSON.stringify({ type: 'message', text: prompts[0] }));
      } else if (msg.type === 'assistant') {
        if (typeof msg.text !== 'string' || !msg.text.trim()) {
          reject(new Error('Empty assistant reply'));
          ws.close();
          return;
        }
        replies.push(msg);
        console.log(`> ${prompts[replies.length - 1]}\n< ${msg.text} [${String(msg.emotion)}]`);
        if (replies.length < prompts.length) {
          ws.send(JSON.stringify({ type: 'message', text: prompts[replies.length] }));
        } else {
          ws.send(JSON.stringify({ type: 'logout' }));
          ws.close();
          resolve();
        }
      } else if (msg.type === 'error') {
        reject(new Error(String(msg.message)));
        ws.close();
      }
    });

    ws.on('error', (err) => reject(err));
    ws.on('close', () => {
      if (replies.length < prompts.length) {
        reject(new Error('Socket closed prematurely'));
      }
    });
  });

  console.log('SMOKE OK');
}

run().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
