import React from 'react';

export const HelpPanel: React.FC = () => (
  <section className="help-panel" aria-label="Bantuan">
    <h2>Bantuan</h2>
    <ul>
      <li>Ketik pertanyaan di kolom pesan lalu tekan Enter atau tombol Kirim.</li>
      <li>Buka panel bukti di bawah jawaban untuk melihat kutipan dokumen sumber.</li>
      <li>Blok teks pada jawaban untuk menyorot kalimat bukti yang paling cocok.</li>
      <li>Klik istilah bercetak tebal untuk menanyakan penjelasannya.</li>
      <li>Tombol logo membawa Anda kembali ke Dashboard SIPADU.</li>
    </ul>
  </section>
);

export default HelpPanel;
