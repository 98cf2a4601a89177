export interface Image {
    url: string;
    width: number;
    height: number;
}

// An actual photo asset (not an avatar)
export interface PhotoImage extends Image {
    ratio: number;            // width / height
    filename: string;         // e.g. "576x432x2.jpg"
}

export interface Camera {
    id: number;
    name: string;             // "Lomo LC-A"
}

export interface Film {
    id: number;
    name: string;             // "Lomographic X-Pro Slide 100"
}

export interface Lens {
    id: number;
    name: string;
}

export interface Tag {
    id: number;
    name: string;
}

export interface User {
    id: number | null;
    username: string;
    url: string;              // profile ("homes") page
    avatar: Image | null;
}

export interface Location {
    latitude: number;
    longitude: number;
}

export interface Photo {
    id: number;
    title: string | null;
    description: string | null;
    url: string;
    camera: Camera | null;
    film: Film | null;
    lens: Lens | null;
    tags: Tag[];
    user: User;
    small: PhotoImage;        // inner bounding box of 96 x 64
    large: PhotoImage;        // outer bounding box of 576 x 576
    location: Location | null;
    // Asset info, passed through unchanged
    assetHash: string;
    assetWidth: number;
    assetHeight: number;
    assetRatio: number;
    assetPreview: string;     // tiny data: URI placeholder
}
