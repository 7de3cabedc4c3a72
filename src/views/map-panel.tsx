export function MapPanel({ countryName, mapImagePath, oob = false }: { countryName: string; mapImagePath: string | null; oob?: boolean }) {
  return (
    <div id="map-image-container" hx-swap-oob={oob ? 'true' : undefined} className="bg-white rounded-lg shadow-sm border p-4">
      <h3 className="font-semibold mb-2">{countryName}</h3>
      {mapImagePath ? (
        <img src={mapImagePath} alt={'Hex map of ' + countryName} className="w-full h-auto" />
      ) : (
        <p className="text-gray-400 text-sm">No map available.</p>
      )}
    </div>
  );
}
