import { createWebhookHandler, UpdateHandler, WebhookResponse } from '../../api/webhook';

class RecordingResponse implements WebhookResponse {
  statusCode?: number;
  body?: string;
  ended = false;

  status(code: number): WebhookResponse {
    this.statusCode = code;
    return this;
  }

  send(body: string): void {
    this.body = body;
  }

  end(): void {
    this.ended = true;
  }
}

const UPDATE = { update_id: 7, message: { message_id: 1, date: 0, chat: { id: 1, type: 'private' }, text: 'hi' } };

function handlerWith(handleUpdate: UpdateHandler['handleUpdate'], secret?: string) {
  return createWebhookHandler(() => ({ handleUpdate }), secret);
}

describe('webhook handler', () => {
  it('answers health checks with OK', async () => {
    const handleUpdate = jest.fn(async () => undefined);
    const res = new RecordingResponse();

    await handlerWith(handleUpdate)({ method: 'GET', query: {}, body: undefined }, res);

    expect(res.statusCode).toBe(200);
    expect(res.body).toBe('OK');
    expect(handleUpdate).not.toHaveBeenCalled();
  });

  it('passes Telegram updates to the bot', async () => {
    const handleUpdate = jest.fn(async () => undefined);
    const res = new RecordingResponse();

    await handlerWith(handleUpdate)({ method: 'POST', query: {}, body: UPDATE }, res);

    expect(handleUpdate).toHaveBeenCalledWith(UPDATE);
    expect(res.statusCode).toBe(200);
    expect(res.body).toBe('OK');
  });

  it('accepts a JSON string body', async () => {
    const handleUpdate = jest.fn(async () => undefined);

    await handlerWith(handleUpdate)({ method: 'POST', query: {}, body: JSON.stringify(UPDATE) }, new RecordingResponse());

    expect(handleUpdate).toHaveBeenCalledWith(UPDATE);
  });

  it('rejects requests without the configured secret', async () => {
    const handleUpdate = jest.fn(async () => undefined);
    const res = new RecordingResponse();

    await handlerWith(handleUpdate, 'test-secret')({ method: 'POST', query: { secret: 'wrong' }, body: UPDATE }, res);

    expect(res.statusCode).toBe(403);
    expect(res.body).toBe('Forbidden');
    expect(handleUpdate).not.toHaveBeenCalled();
  });

  it('accepts requests carrying the configured secret', async () => {
    const handleUpdate = jest.fn(async () => undefined);
    const res = new RecordingResponse();

    await handlerWith(handleUpdate, 'test-secret')({ method: 'POST', query: { secret: 'test-secret' }, body: UPDATE }, res);

    expect(res.statusCode).toBe(200);
    expect(handleUpdate).toHaveBeenCalledTimes(1);
  });

  it('rejects bodies that are not updates', async () => {
    const handleUpdate = jest.fn(async () => undefined);
    const res = new RecordingResponse();

    await handlerWith(handleUpdate)({ method: 'POST', query: {}, body: { hello: 'world' } }, res);

    expect(res.statusCode).toBe(400);
    expect(res.body).toBe('Bad Request');
  });

  it('answers 500 when the bot throws', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const res = new RecordingResponse();

    await handlerWith(async () => {
      throw new Error('boom');
    })({ method: 'POST', query: {}, body: UPDATE }, res);

    expect(res.statusCode).toBe(500);
    expect(res.ended).toBe(true);
    jest.restoreAllMocks();
  });
});
