import { NextResponse } from 'next/server';
import { methodNotAllowed } from '@/lib/http';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET() {
    return NextResponse.json({ status: 'ok' });
}

const notAllowed = methodNotAllowed(['GET']);
export const POST = notAllowed;
export const PUT = notAllowed;
export const PATCH = notAllowed;
export const DELETE = notAllowed;
// Without these, Next answers HEAD through GET and OPTIONS with 204.
export const HEAD = notAllowed;
export const OPTIONS = notAllowed;
