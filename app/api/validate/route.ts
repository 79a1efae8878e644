import { NextResponse } from 'next/server';
import { loadConfigFromEnv } from '@/lib/config';
import { eLog } from '@/lib/logger';
import { validateImage } from '@/lib/pipeline';

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
    const outcome = await validateImage(bytes, loadConfigFromEnv());
    return NextResponse.json(outcome);
  } catch (error) {
    eLog('api/validate', error);
    const message = error instanceof Error ? error.message : 'Validation failed';
    return NextResponse.json({ error: message }, { status: 500 });
  }
}
