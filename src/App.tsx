import CatalogDashboard from './components/CatalogDashboard';
import './App.css';

export default function App() {
  return (
    <>
      <CatalogDashboard />
      <footer className="app-footer">
        Reference data for heating-surface materials and dimensions. Values are as entered by operators;
        check them against the boiler passport before use.
      </footer>
    </>
  );
}
