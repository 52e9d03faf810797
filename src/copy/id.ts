import type { RecommendationTier } from "../types";

export interface RecommendationSection {
  heading: string;
  items: string[];
}

export interface TierCopy {
  title: string;
  summary: string;
  sections: RecommendationSection[];
}

export interface ScreeningCopyPack {
  tiers: Record<RecommendationTier, TierCopy>;
  criticalWarning: { title: string; body: string; actions: string[] };
  sidebarWarning: string;
  disclaimer: string[];
}

export function buildIndonesianCopyPack(): ScreeningCopyPack {
  return {
    tiers: {
      diabetes: {
        title: "Rekomendasi untuk Nilai Diabetes (≥ 200 mg/dL)",
        summary: "Nilai glukosa Anda termasuk kategori diabetes.",
        sections: [
          {
            heading: "Konsultasi Medis Segera",
            items: [
              "PRIORITAS: buat janji dengan dokter dalam 1-2 minggu",
              "Lakukan pemeriksaan HbA1c (target: < 7%)",
              "Diskusikan kemungkinan perlu obat oral atau insulin",
              "Lakukan pemeriksaan komplikasi (mata, ginjal, saraf)",
            ],
          },
          {
            heading: "Manajemen Darurat",
            items: [
              "Monitor gula darah 3-4 kali sehari",
              "Waspada gejala hiperglikemia " +
                "(haus berlebihan, sering buang air kecil, lemas)",
              "Siapkan rencana darurat jika gula darah > 300 mg/dL",
            ],
          },
          {
            heading: "Perubahan Diet",
            items: [
              "Konsultasi dengan ahli gizi",
              "Hitung kebutuhan kalori harian",
              "Batasi karbohidrat < 45% total kalori",
              "Hindari gula tambahan dan makanan olahan",
            ],
          },
          {
            heading: "Aktivitas Fisik",
            items: [
              "Olahraga 150 menit/minggu (intensitas sedang)",
              "Latihan kekuatan 2x/minggu",
              "Hindari duduk terlalu lama",
            ],
          },
        ],
      },
      prediabetes: {
        title: "Rekomendasi untuk Nilai Prediabetes (140-199 mg/dL)",
        summary: "Nilai glukosa Anda termasuk kategori prediabetes.",
        sections: [
          {
            heading: "Intervensi Dini",
            items: [
              "Konsultasi dokter untuk pencegahan progresi",
              "Lakukan pemeriksaan lanjutan dalam 3-6 bulan",
              "Pertimbangkan program pencegahan diabetes",
            ],
          },
          {
            heading: "Modifikasi Gaya Hidup",
            items: [
              "Turunkan 5-7% berat badan jika overweight",
              "Tingkatkan aktivitas fisik ≥ 150 menit/minggu",
              "Pilih karbohidrat kompleks (gandum utuh, sayuran)",
            ],
          },
          {
            heading: "Monitoring",
            items: [
              "Cek gula darah 1-2 kali/minggu",
              "Monitor berat badan mingguan",
              "Catat asupan makanan harian",
            ],
          },
          {
            heading: "Edukasi",
            items: [
              "Ikuti program edukasi diabetes",
              "Pelajari gejala diabetes",
              "Pahami faktor risiko",
            ],
          },
        ],
      },
      normal: {
        title: "Rekomendasi untuk Nilai Normal (< 140 mg/dL)",
        summary: "Nilai glukosa Anda dalam rentang normal.",
        sections: [
          {
            heading: "Pencegahan",
            items: [
              "Pertahankan berat badan ideal",
              "Lakukan medical check-up tahunan",
              "Monitor faktor risiko keluarga",
            ],
          },
          {
            heading: "Gaya Hidup Sehat",
            items: [
              "Konsumsi makanan seimbang",
              "Tetap aktif secara fisik",
              "Kelola stres dengan baik",
            ],
          },
          {
            heading: "Awareness",
            items: [
              "Kenali gejala diabetes dini",
              "Waspada jika ada perubahan kesehatan",
              "Edukasi keluarga tentang pencegahan diabetes",
            ],
          },
        ],
      },
    },
    criticalWarning: {
      title: "PERHATIAN: NILAI GLUKOSA TINGGI!",
      body:
        "Glukosa ≥ 200 mg/dL termasuk kategori DIABETES " +
        "berdasarkan standar medis.",
      actions: [
        "Segera konsultasi dengan dokter spesialis penyakit dalam " +
          "atau endokrinologi",
        "Lakukan pemeriksaan HbA1c untuk konfirmasi diagnosis",
        "Mulai monitoring gula darah rutin",
        "Pertimbangkan perubahan gaya hidup segera",
      ],
    },
    sidebarWarning:
      "Glukosa ≥ 200 mg/dL termasuk kategori DIABETES. " +
      "Segera konsultasikan dengan dokter untuk pemeriksaan lebih lanjut.",
    disclaimer: [
      "Aplikasi ini untuk tujuan edukasi dan skrining awal saja.",
      "Tidak menggantikan diagnosis dokter profesional.",
      "Nilai glukosa ≥ 200 mg/dL memerlukan evaluasi medis segera.",
    ],
  };
}
