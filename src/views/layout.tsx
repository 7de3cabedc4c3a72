import type { ReactNode } from 'react';

const HTMX_HANDLERS = `
document.body.addEventListener('htmx:beforeSwap', function (evt) {
  if (evt.detail.xhr.status === 404) {
    evt.detail.shouldSwap = true;
    evt.detail.isError = false;
    evt.detail.target = htmx.find('#flash');
  }
});
`;

const NAV = [
  { href: '/', label: 'Pray' },
  { href: '/queue', label: 'Queue' },
  { href: '/prayed', label: 'Prayed for' },
  { href: '/stats', label: 'Statistics' },
  { href: '/about', label: 'About' },
];

export function Layout({ title, children }: { title: string; children: ReactNode }) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{title + ' | PrayReps'}</title>
        <script src="https://cdn.tailwindcss.com"></script>
        <script src="https://unpkg.com/htmx.org@1.9.12"></script>
      </head>
      <body className="bg-gray-50 text-gray-900">
        <header className="bg-indigo-900 text-white px-6 py-4 shadow-md">
          <nav className="max-w-6xl mx-auto flex items-center justify-between">
            <a href="/" className="text-xl font-bold">PrayReps</a>
            <div className="flex gap-6 text-sm">
              {NAV.map((item) => (
                <a key={item.href} href={item.href} className="hover:text-yellow-300 transition">{item.label}</a>
              ))}
            </div>
          </nav>
        </header>
        <main className="max-w-6xl mx-auto px-4 py-6">
          <div id="flash"></div>
          {children}
        </main>
        <footer className="bg-gray-100 text-gray-500 text-center py-4 text-sm mt-12">
          PrayReps. Pray for those who govern.
        </footer>
        <script dangerouslySetInnerHTML={{ __html: HTMX_HANDLERS }} />
      </body>
    </html>
  );
}
