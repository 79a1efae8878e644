import { NextResponse } from 'next/server';
import { loadConfigFromEnv } from '@/lib/config';
import { eLog } from '@/lib/logger';
import { preprocessImage } from '@/lib/pipeline';

export const runtime = 'nodejs';
export const maxDuration = 30;

export async function POST(req: Request) {
  try {
    const form = await req.formData();
    const file = form.get('image');

    if (!file || !(file instanceof File)) {
      return NextResponse.json({ error: 'Missing image file' }, { status: 400 });
    }

    const bytes = Buffer.from(await file.arrayBuffer());
    const result = await preprocessImage(bytes, loadConfigFromEnv());

    if (!result.ok) {
      const { error } = result;
      if (error.kind === 'decode') {
        return NextResponse.json({ error: error.message, reason: error.reason }, { status: 400 });
      }
      if (error.kind === 'validation') {
        return NextResponse.json(
          { error: error.outcome.message, reason: error.outcome.reason },
          { status: 422 }
        );
      }
      return NextResponse.json({ error: error.message }, { status: 500 });
    }

    const { png, width, height, metrics } = result.value;
    return NextResponse.json({
      imageBase64: png.toString('base64'),
      mimeType: 'image/png',
      width,
      height,
      metrics
    });
  } catch (error) {
    eLog('api/preprocess', error);
    const message = error instanceof Error ? error.message : 'Preprocessing failed';
    return NextResponse.json({ error: message }, { status: 500 });
  }
}
