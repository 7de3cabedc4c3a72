export function Notice({ message }: { message: string }) {
  return (
    <div id="flash" role="alert" className="bg-yellow-50 border border-yellow-300 text-yellow-900 rounded p-3 mb-4 text-sm">
      {message}
    </div>
  );
}
